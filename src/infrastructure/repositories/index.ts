export { TypeOrmCircleRepository } from './circle.repository';
export { repositoriesProviders } from './repositories.providers';
