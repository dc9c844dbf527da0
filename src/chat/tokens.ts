import type { TokenUsage } from '../schema/index.js';
import { EMPTY_USAGE } from '../schema/index.js';

export interface UsageSummary {
  inputTokens: number;
  outputTokens: number;
}

/** Running token counters for one engine. */
export class TokenTally {
  private inputTokens = 0;
  private outputTokens = 0;
  private lastUsage: TokenUsage = EMPTY_USAGE;

  record(usage: TokenUsage): void {
    this.inputTokens += usage.promptTokens;
    this.outputTokens += usage.completionTokens;
    this.lastUsage = { ...usage };
  }

  get input(): number {
    return this.inputTokens;
  }

  get output(): number {
    return this.outputTokens;
  }

  get last(): UsageSummary {
    return {
      inputTokens: this.lastUsage.promptTokens,
      outputTokens: this.lastUsage.completionTokens,
    };
  }

  get usage(): UsageSummary {
    return { inputTokens: this.inputTokens, outputTokens: this.outputTokens };
  }
}
