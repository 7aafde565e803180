/**
 * Scantrail NestJS Module
 *
 * HTTP surface and ingestion runner around the scantrail core
 */

// Main module
export { ScanTrailModule } from './scantrail.module';

// Configuration
export type {
  ScanTrailModuleConfig,
  ScanTrailModuleAsyncConfig,
} from './scantrail.config';
export {
  defaultScanTrailConfig,
  mergeScanTrailConfig,
} from './scantrail.config';
export {
  EnvironmentVariables,
  validateEnvironment,
  scanTrailConfigFromEnvironment,
} from './config/environment';

// Injection tokens
export * from './constants';

// Controllers
export * from './controllers';

// Services
export * from './services';

// Filters, interceptors and guards
export * from './filters';
export * from './interceptors';
export * from './middleware';
