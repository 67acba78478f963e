import { QuickBooksAdapter } from '../../src/services/profiles/quickbooks.adapter';
import { ShopifyAdapter } from '../../src/services/profiles/shopify.adapter';

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('profile sources', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  describe('QuickBooksAdapter', () => {
    const adapter = new QuickBooksAdapter({
      baseUrl: 'https://qb.example.com',
      realmId: '9130',
      accessToken: 'test-token',
      retryDelayMs: 0,
    });

    it('should skip the lookup when not configured', async () => {
      const unconfigured = new QuickBooksAdapter({ baseUrl: 'https://qb.example.com' });
      expect(await unconfigured.lookupByPhone('15550001234')).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should map a company customer to a business profile', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          QueryResponse: {
            Customer: [
              {
                Id: '58',
                DisplayName: ' Ana Lopez ',
                CompanyName: 'Lopez Studio',
                PrimaryEmailAddr: { Address: 'ana@lopez.example' },
                Active: true,
              },
            ],
          },
        })
      );

      const profile = await adapter.lookupByPhone('15550001234');

      expect(profile).toEqual({
        accounting_id: '58',
        customer_name: 'Ana Lopez',
        email: 'ana@lopez.example',
        company_name: 'Lopez Studio',
        customer_type: 'business',
        is_active: true,
      });
      const [url] = fetchMock.mock.calls[0];
      expect(url).toBe(
        `https://qb.example.com/v3/company/9130/query?query=${encodeURIComponent(
          "SELECT * FROM Customer WHERE PrimaryPhone = '15550001234'"
        )}&minorversion=65`
      );
    });

    it('should treat a customer without a company as a consumer', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ QueryResponse: { Customer: [{ Id: '59' }] } }));

      const profile = await adapter.lookupByPhone('15550001234');

      expect(profile).toMatchObject({ customer_type: 'consumer', customer_name: null, is_active: true });
    });

    it('should return null when nothing matches', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ QueryResponse: {} }));
      expect(await adapter.lookupByPhone('15550001234')).toBeNull();
    });
  });

  describe('ShopifyAdapter', () => {
    const adapter = new ShopifyAdapter({ storeDomain: 'shop.example.com', accessToken: 'test-token', retryDelayMs: 0 });

    it('should map the first matching customer', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            customers: {
              edges: [
                {
                  node: {
                    id: 'gid://shopify/Customer/7',
                    displayName: 'Ana L.',
                    defaultEmailAddress: { emailAddress: 'ana@shop.example' },
                    defaultAddress: { address1: '1 Canal Road', city: 'Lahore', province: null, country: 'PK', zip: null },
                    amountSpent: { amount: '120.50' },
                  },
                },
              ],
            },
          },
        })
      );

      const profile = await adapter.lookupByPhone('15550001234');

      expect(profile).toEqual({
        storefront_id: 'gid://shopify/Customer/7',
        displayName: 'Ana L.',
        email: 'ana@shop.example',
        addressParts: ['1 Canal Road', 'Lahore', null, 'PK', null],
        totalSpent: 120.5,
      });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe('https://shop.example.com/admin/api/2024-07/graphql.json');
      expect(JSON.parse(String(init.body)).variables).toEqual({ query: 'phone:+15550001234' });
    });

    it('should return null when the storefront has no such customer', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { customers: { edges: [] } } }));
      expect(await adapter.lookupByPhone('15550001234')).toBeNull();
    });
  });
});
