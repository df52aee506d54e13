export { ConsoleLogger, NoopLogger, formatDiagnostic } from './logging.js';
export type { Logger, DiagnosticLevel, DiagnosticContext } from './logging.js';
