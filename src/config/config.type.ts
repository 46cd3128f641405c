import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { AuthConfig } from '../auth/config/auth-config.type';
import { DatabaseConfig } from '../database/config/database-config.type';
import { SummaryExtractionConfig } from '../summary-extraction/config/summary-extraction-config.type';

export type AllConfigType = {
  app: AppConfig;
  auth: AuthConfig;
  database: DatabaseConfig;
  throttler: ThrottlerConfig;
  summaryExtraction: SummaryExtractionConfig;
};
