import { LlmHandler } from './handler';

export class GreetingHandler extends LlmHandler {
  readonly name = 'GreetingHandler' as const;
}
