import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let service: HealthService;
  let query: jest.Mock<Promise<unknown>, [string]>;
  let dataSource: { isInitialized: boolean; query: typeof query };

  beforeEach(async () => {
    query = jest.fn();
    dataSource = { isInitialized: true, query };

    const module: TestingModule = await Test.createTestingModule({
      providers: [HealthService, { provide: DataSource, useValue: dataSource }],
    }).compile();

    service = module.get(HealthService);
  });

  it('should report healthy when the check query succeeds', async () => {
    query.mockResolvedValue([{ '?column?': 1 }]);

    const health = await service.checkDatabaseHealth();

    expect(query).toHaveBeenCalledWith('SELECT 1');
    expect(health.status).toBe('healthy');
    expect(health.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('should report unhealthy without leaking the driver error', async () => {
    query.mockRejectedValue(new Error('connect ECONNREFUSED db.internal:5432'));

    await expect(service.checkDatabaseHealth()).resolves.toEqual({
      status: 'unhealthy',
      error: 'Database query failed',
    });
  });

  it('should not query before the connection is initialized', async () => {
    dataSource.isInitialized = false;

    await expect(service.checkDatabaseHealth()).resolves.toEqual({
      status: 'unhealthy',
      error: 'Database connection not initialized',
    });
    expect(query).not.toHaveBeenCalled();
  });
});
