export { healthController, HealthController } from './health.controller';
export { matchingController, MatchingController } from './matching.controller';
