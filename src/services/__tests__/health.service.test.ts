import { describe, it, expect } from 'vitest';

import { HealthService } from '../health.service.js';
import { UnavailableDatabase } from '../../databases/unavailable.database.js';
import { TestMemoryDatabase } from '../../__tests__/test-memory-database.js';
import { getTestConfig } from '../../__tests__/test-express-app.js';

describe('HealthService', () => {
  it('should report a missing connection without failing', async () => {
    const service = new HealthService(new UnavailableDatabase(), getTestConfig());

    expect(await service.getDiagnostics()).toEqual({
      backend: 'Running',
      database: 'Not Available',
      database_url: null,
      database_name: null,
      connection_status: 'Not Connected',
      collections: [],
    });
  });

  it('should list at most ten collections of a connected store', async () => {
    const database = new TestMemoryDatabase();
    for (let i = 0; i < 12; i++) {
      database.seed(`collection${i}`, [{ value: i }]);
    }
    const service = new HealthService(database, getTestConfig());

    const diagnostics = await service.getDiagnostics();

    expect(diagnostics.database).toBe('Connected & Working');
    expect(diagnostics.database_url).toBe('Set');
    expect(diagnostics.database_name).toBe('school-portal-test');
    expect(diagnostics.connection_status).toBe('Connected');
    expect(diagnostics.collections).toEqual([
      'collection0', 'collection1', 'collection2', 'collection3', 'collection4',
      'collection5', 'collection6', 'collection7', 'collection8', 'collection9',
    ]);
  });

  it('should say Not Set when the configuration carries no database url', async () => {
    const service = new HealthService(new TestMemoryDatabase(), { ...getTestConfig(), database: undefined });

    expect((await service.getDiagnostics()).database_url).toBe('Not Set');
  });

  it('should fold a listing failure into the report', async () => {
    const database = new TestMemoryDatabase();
    database.failWith(new Error('not authorized'));
    const service = new HealthService(database, getTestConfig());

    const diagnostics = await service.getDiagnostics();

    expect(diagnostics.database).toBe('Connected but Error: Database unavailable: not authorized');
    expect(diagnostics.connection_status).toBe('Connected');
    expect(diagnostics.collections).toEqual([]);
  });
});
