export { CircleService } from './circle.service';
export { HealthService } from './health.service';
