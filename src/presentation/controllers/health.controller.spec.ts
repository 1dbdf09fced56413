import { ServiceUnavailableException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ComponentHealthDto, HealthResponseDto } from '@/application/dtos';
import { HealthService } from '@/application/services';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;
  let mockHealthService: { check: jest.Mock };

  beforeEach(async () => {
    mockHealthService = { check: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [{ provide: HealthService, useValue: mockHealthService }],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  it('should return the report when healthy', async () => {
    const report = new HealthResponseDto(new ComponentHealthDto('healthy', 1));
    mockHealthService.check.mockResolvedValue(report);

    await expect(controller.check()).resolves.toBe(report);
  });

  it('should answer 503 when the database is unreachable', async () => {
    mockHealthService.check.mockResolvedValue(
      new HealthResponseDto(new ComponentHealthDto('unhealthy', 3000, 'Timeout')),
    );

    const promise = controller.check();

    await expect(promise).rejects.toThrow(ServiceUnavailableException);
    await expect(promise).rejects.toThrow('Database unavailable: Timeout');
  });
});
