import { StatementSerializer } from '@csv2ofx/output';
import type { BalanceSummary, ConversionConfig, StatementPeriod, TransactionRecord } from '@csv2ofx/types';

export interface RenderOptions {
  /** DTSERVER timestamp; defaults to the period end */
  generatedAt?: Date;
}

/**
 * Assembled records awaiting review. Records can be deleted or restored
 * before rendering; rendering never changes them.
 */
export class ConversionSession {
  private readonly serializer: StatementSerializer;
  private readonly config: ConversionConfig;
  private readonly configuredPeriod: StatementPeriod | null;

  constructor(serializer: StatementSerializer, config: ConversionConfig, period: StatementPeriod | null) {
    this.serializer = serializer;
    this.config = config;
    this.configuredPeriod = period;
  }

  get records(): readonly TransactionRecord[] {
    return this.serializer.records;
  }

  setDeleted(index: number, deleted: boolean): void {
    this.serializer.setDeleted(index, deleted);
  }

  restoreAll(): void {
    this.serializer.records.forEach((_, index) => this.serializer.setDeleted(index, false));
  }

  summary(): BalanceSummary {
    return this.serializer.summary(this.config.initialBalance);
  }

  /**
   * The configured statement period, or the span of the remaining records
   * when none was configured. Null when neither exists.
   */
  period(): StatementPeriod | null {
    if (this.configuredPeriod !== null) {
      return this.configuredPeriod;
    }

    const dates = this.serializer.sortedRecords().map((record) => record.date);
    const first = dates[0];
    const last = dates[dates.length - 1];
    if (first === undefined || last === undefined) {
      return null;
    }
    return { start: first, end: last };
  }

  render(options: RenderOptions = {}): string {
    return this.serializer.generate({
      accountId: this.config.accountId,
      bankName: this.config.bankName,
      currency: this.config.currency,
      language: this.config.language,
      period: this.period(),
      initialBalance: this.config.initialBalance,
      finalBalance: this.config.finalBalance,
      generatedAt: options.generatedAt,
    });
  }
}
