export { healthService, HealthService } from './health.service';
export { batchService } from './batch.service';
export * from './batch.service';
export { matchingService } from './matching.service';
export * from './matching.service';
