export { CircleController } from './circle.controller';
export { HealthController } from './health.controller';
export { VersionController } from './version.controller';
