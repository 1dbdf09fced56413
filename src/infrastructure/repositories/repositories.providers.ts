import { Provider } from '@nestjs/common';
import { CIRCLE_REPOSITORY } from '@/domain/repositories';
import { TypeOrmCircleRepository } from './circle.repository';

export const repositoriesProviders: Provider[] = [
  {
    provide: CIRCLE_REPOSITORY,
    useClass: TypeOrmCircleRepository,
  },
];
