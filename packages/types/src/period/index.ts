export { PeriodValidator, DateStatus, createStatementPeriod, type StatementPeriod } from './period-validator.js';
