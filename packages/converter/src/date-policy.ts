import { DateStatus, type DateAction, type PeriodConfig, type PeriodValidator } from '@csv2ofx/types';

export type DateOutcome =
  | { kind: 'within'; date: Date }
  | { kind: 'adjusted'; date: Date; from: Date }
  | { kind: 'kept'; date: Date }
  | { kind: 'excluded' };

/**
 * Action for an out-of-range row: the per-row decision, else the configured
 * policy, else adjust dates before the period and keep dates after it.
 */
export function resolveDateAction(status: DateStatus, row: number, config: PeriodConfig): DateAction {
  const decision = config.decisions[String(row)];
  if (decision !== undefined) {
    return decision;
  }
  if (config.outOfRange !== undefined) {
    return config.outOfRange;
  }
  return status === DateStatus.Before ? 'adjust' : 'keep';
}

export function applyDatePolicy(
  date: Date,
  row: number,
  validator: PeriodValidator,
  config: PeriodConfig
): DateOutcome {
  const status = validator.status(date);
  if (status === DateStatus.Within) {
    return { kind: 'within', date };
  }

  switch (resolveDateAction(status, row, config)) {
    case 'keep':
      return { kind: 'kept', date };
    case 'adjust':
      return { kind: 'adjusted', date: validator.clamp(date), from: date };
    case 'exclude':
      return { kind: 'excluded' };
  }
}
