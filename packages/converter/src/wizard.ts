/**
 * Step flow of an interactive conversion front end.
 *
 * The machine only tracks which step is active and whether the data
 * gathered so far lets the user leave it; rendering each step is left to
 * the host UI.
 */

import { normalizeAmount } from '@csv2ofx/csv-decoder';
import {
  formatAmount,
  isConversionError,
  PeriodValidator,
  type ColumnMappingInput,
  type ConversionConfigInput,
  type DecimalSeparator,
  type Delimiter,
  type DescriptionSeparator,
} from '@csv2ofx/types';

export const WIZARD_STATES = [
  'FileSelect',
  'Format',
  'Preview',
  'Config',
  'Mapping',
  'Options',
  'BalancePreview',
] as const;
export type WizardState = (typeof WIZARD_STATES)[number];

export interface WizardData {
  fileName: string;
  delimiter: Delimiter;
  decimalSeparator: DecimalSeparator;
  /** Data rows found by the preview step */
  rowCount: number;
  currency: string;
  accountId: string;
  bankName: string;
  dateRange: { enabled: boolean; start: string; end: string };
  columns: ColumnMappingInput;
  descriptionSeparator: DescriptionSeparator;
  invertValues: boolean;
  /** Balances as typed by the user, using the chosen decimal separator */
  initialBalance: string;
  finalBalance: { manual: boolean; value: string };
}

export type StepValidation = { valid: true } | { valid: false; error: string };

export function createWizardData(): WizardData {
  return {
    fileName: '',
    delimiter: 'comma',
    decimalSeparator: 'dot',
    rowCount: 0,
    currency: 'BRL',
    accountId: '',
    bankName: '',
    dateRange: { enabled: false, start: '', end: '' },
    columns: { date: null, amount: null, description: [] },
    descriptionSeparator: 'space',
    invertValues: false,
    initialBalance: '0',
    finalBalance: { manual: false, value: '' },
  };
}

const OK: StepValidation = { valid: true };

function invalid(error: string): StepValidation {
  return { valid: false, error };
}

function isAmount(value: string, decimalSeparator: DecimalSeparator): boolean {
  try {
    normalizeAmount(value, decimalSeparator);
    return true;
  } catch (error) {
    if (isConversionError(error)) {
      return false;
    }
    throw error;
  }
}

/**
 * Guard for leaving a step.
 */
export function validateStep(state: WizardState, data: WizardData): StepValidation {
  switch (state) {
    case 'FileSelect':
      return data.fileName.trim() === '' ? invalid('Please select a CSV file') : OK;
    case 'Format':
      return OK;
    case 'Preview':
      return data.rowCount > 0 ? OK : invalid('The CSV file has no data rows');
    case 'Config': {
      if (!/^[A-Za-z]{3}$/.test(data.currency.trim())) {
        return invalid('Currency must be a three-letter code');
      }
      if (!data.dateRange.enabled) {
        return OK;
      }
      try {
        new PeriodValidator(data.dateRange.start, data.dateRange.end);
        return OK;
      } catch (error) {
        if (isConversionError(error)) {
          return invalid(error.message);
        }
        throw error;
      }
    }
    case 'Mapping': {
      const { date, amount, description } = data.columns;
      if (date === null || amount === null) {
        return invalid('Date and amount columns must be mapped');
      }
      if (!description.some((index) => index !== null)) {
        return invalid('Select at least one description column');
      }
      return OK;
    }
    case 'Options':
      return OK;
    case 'BalancePreview':
      if (!isAmount(data.initialBalance, data.decimalSeparator)) {
        return invalid(`Invalid initial balance: ${data.initialBalance}`);
      }
      if (data.finalBalance.manual && !isAmount(data.finalBalance.value, data.decimalSeparator)) {
        return invalid(`Invalid final balance: ${data.finalBalance.value}`);
      }
      return OK;
  }
}

export class WizardMachine {
  private position = 0;
  private data: WizardData;

  constructor(data: WizardData = createWizardData()) {
    this.data = data;
  }

  get state(): WizardState {
    return WIZARD_STATES[this.position] ?? 'FileSelect';
  }

  get snapshot(): Readonly<WizardData> {
    return this.data;
  }

  get isLastStep(): boolean {
    return this.position === WIZARD_STATES.length - 1;
  }

  update(patch: Partial<WizardData>): void {
    this.data = { ...this.data, ...patch };
  }

  canAdvance(): boolean {
    return validateStep(this.state, this.data).valid;
  }

  /**
   * Move forward when the current step validates. The last step never
   * advances; callers finish by building the config instead.
   */
  next(): StepValidation {
    const result = validateStep(this.state, this.data);
    if (result.valid && !this.isLastStep) {
      this.position++;
    }
    return result;
  }

  back(): boolean {
    if (this.position === 0) {
      return false;
    }
    this.position--;
    return true;
  }

  toConversionConfig(): ConversionConfigInput {
    return toConversionConfig(this.data);
  }
}

/**
 * Conversion config for the data gathered by the wizard. Balances are
 * normalized with the selected decimal separator.
 */
export function toConversionConfig(data: WizardData): ConversionConfigInput {
  const config: ConversionConfigInput = {
    delimiter: data.delimiter,
    decimalSeparator: data.decimalSeparator,
    columns: data.columns,
    descriptionSeparator: data.descriptionSeparator,
    currency: data.currency.trim().toUpperCase(),
    invertValues: data.invertValues,
    initialBalance: formatAmount(normalizeAmount(data.initialBalance, data.decimalSeparator)),
  };
  if (data.accountId.trim() !== '') {
    config.accountId = data.accountId.trim();
  }
  if (data.bankName.trim() !== '') {
    config.bankName = data.bankName.trim();
  }
  if (data.finalBalance.manual) {
    config.finalBalance = formatAmount(normalizeAmount(data.finalBalance.value, data.decimalSeparator));
  }
  if (data.dateRange.enabled) {
    config.period = { start: data.dateRange.start, end: data.dateRange.end };
  }
  return config;
}
