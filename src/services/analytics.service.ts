import { env } from '../config/env';
import { CustomerStats } from '../types/analytics';
import { AnalyticsStore, CustomerStore } from '../types/store';

export interface AnalyticsOptions {
  highValueThreshold?: number;
  topCustomers?: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function average(sum: number, count: number): number {
  return count > 0 ? round2(sum / count) : 0;
}

function escalationRate(stats: CustomerStats): number {
  return average(stats.escalated * 100, stats.total);
}

/** Dashboard aggregates over customers and chat history. */
export class AnalyticsService {
  private highValueThreshold: number;
  private topCustomers: number;

  constructor(
    private store: AnalyticsStore & Pick<CustomerStore, 'listCustomers'>,
    options: AnalyticsOptions = {}
  ) {
    this.highValueThreshold = options.highValueThreshold ?? env.HIGH_VALUE_SPEND;
    this.topCustomers = options.topCustomers ?? 5;
  }

  async overview() {
    const [stats, messages, top] = await Promise.all([
      this.store.getCustomerStats(this.highValueThreshold),
      this.messageStats(),
      this.store.getTopCustomersBySpend(this.topCustomers),
    ]);

    return {
      customer_stats: {
        total_customers: stats.total,
        active_customers: stats.active,
        escalated_customers: stats.escalated,
        business_customers: stats.business,
        consumer_customers: stats.consumer,
        avg_total_spend: average(stats.total_spend, stats.total),
      },
      message_stats: messages,
      top_customers_by_spend: top,
    };
  }

  async customerStats() {
    const stats = await this.store.getCustomerStats(this.highValueThreshold);
    return {
      total: stats.total,
      active: stats.active,
      inactive: stats.total - stats.active,
      escalated: stats.escalated,
      by_type: { business: stats.business, consumer: stats.consumer },
      spend_analysis: {
        total_spend: round2(stats.total_spend),
        avg_spend: average(stats.total_spend, stats.total),
        high_value_customers: stats.high_value,
        high_value_threshold: this.highValueThreshold,
      },
    };
  }

  async escalations(limit: number) {
    const [stats, escalated] = await Promise.all([
      this.store.getCustomerStats(this.highValueThreshold),
      this.store.listCustomers({ limit, escalated: true }),
    ]);

    return {
      total_escalations: stats.escalated,
      escalation_rate: escalationRate(stats),
      escalated_by_type: { business: stats.escalated_business, consumer: stats.escalated_consumer },
      escalated_customers: escalated.map((c) => ({
        phone_number: c.phone_number,
        customer_name: c.customer_name,
        customer_type: c.customer_type,
        total_spend: c.total_spend,
      })),
    };
  }

  async messageStats() {
    const stats = await this.store.getMessageStats();
    return {
      total_conversations: stats.total_conversations,
      total_messages: stats.total_messages,
      avg_messages_per_conversation: average(stats.total_messages, stats.total_conversations),
      message_types: stats.message_types,
    };
  }

  async dashboard() {
    const stats = await this.store.getCustomerStats(this.highValueThreshold);
    return {
      total_customers: stats.total,
      active_customers: stats.active,
      escalated_customers: stats.escalated,
      total_revenue: round2(stats.total_spend),
      avg_customer_value: average(stats.total_spend, stats.total),
      customer_breakdown: { business: stats.business, consumer: stats.consumer },
      escalation_rate: escalationRate(stats),
    };
  }
}
