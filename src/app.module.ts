import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CircleService, HealthService } from './application/services';
import { Environment, EnvironmentVariables, validate } from './infrastructure/config';
import { CircleEntity, MemberEntity } from './infrastructure/database/entities';
import { TypeOrmLogger } from './infrastructure/database/typeorm-logger';
import { loggerProviders } from './infrastructure/logger';
import { repositoriesProviders } from './infrastructure/repositories';
import { CircleController, HealthController, VersionController } from './presentation/controllers';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables>) => {
        const loggingEnabled = configService.get('TYPEORM_LOGGING', true);
        return {
          type: 'better-sqlite3',
          database: configService.get('DATABASE_PATH', './data/circles.sqlite'),
          entities: [CircleEntity, MemberEntity],
          synchronize: configService.get('NODE_ENV') !== Environment.Production,
          logging: loggingEnabled,
          logger: loggingEnabled ? new TypeOrmLogger() : undefined,
        };
      },
    }),
    TypeOrmModule.forFeature([CircleEntity, MemberEntity]),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables>) => [
        {
          ttl: configService.get('RATE_LIMIT_TTL', 60) * 1000,
          limit: configService.get('RATE_LIMIT_MAX', 100),
        },
      ],
    }),
  ],
  controllers: [VersionController, CircleController, HealthController],
  providers: [
    ...repositoriesProviders,
    ...loggerProviders,
    CircleService,
    HealthService,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
  ],
})
export class AppModule {}
