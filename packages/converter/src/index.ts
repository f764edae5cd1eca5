export {
  convertCsv,
  formatSuccessMessage,
  type ConversionResult,
  type ConversionStats,
  type ConvertOptions,
  type RowError,
} from './converter.js';
export { ConversionSession, type RenderOptions } from './session.js';
export { applyDatePolicy, resolveDateAction, type DateOutcome } from './date-policy.js';
export {
  WIZARD_STATES,
  WizardMachine,
  createWizardData,
  toConversionConfig,
  validateStep,
  type StepValidation,
  type WizardData,
  type WizardState,
} from './wizard.js';
