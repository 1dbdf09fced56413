export { CIRCLE_REPOSITORY } from './circle.repository.interface';
export type { CircleRepository } from './circle.repository.interface';
