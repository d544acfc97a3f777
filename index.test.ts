import { describe, it, expect } from '@jest/globals';
import request from 'supertest';
import { start } from './index.js';
import { loadConfig } from './config.js';

describe('start', () => {
  it('serves HTTP without a database or broker and shuts down cleanly', async () => {
    const service = await start({ ...loadConfig({ LOG_LEVEL: 'error' }), port: 0 });
    try {
      expect(service.listener).toBeUndefined();
      const res = await request(service.server).get('/readyz');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('degraded');
    } finally {
      await service.stop();
    }
    expect(service.server.listening).toBe(false);
  });
});
