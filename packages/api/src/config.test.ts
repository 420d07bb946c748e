import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      database: {
        host: 'localhost',
        port: 5432,
        database: 'requisition',
        user: 'requisition',
        password: 'requisition',
        max: 10,
      },
      jwtSecret: undefined,
      logLevel: 'info',
      receiptTolerance: { quantity: 0, price: 0 },
      poNumberPrefix: 'PO',
      poGenerationTimeoutMs: 5000,
      rulesFile: undefined,
    });
  });

  it('should treat blank database settings as unset', () => {
    const config = loadConfig({ DB_HOST: '', DB_NAME: '', DB_USER: '', DB_PORT: '' });

    expect(config.database).toMatchObject({
      host: 'localhost',
      port: 5432,
      database: 'requisition',
      user: 'requisition',
    });
  });

  it('should read numeric and optional values', () => {
    const config = loadConfig({
      PORT: '8080',
      DB_POOL_MAX: '4',
      JWT_SECRET: 'test-secret',
      RECEIPT_PRICE_TOLERANCE: '0.05',
      PO_NUMBER_PREFIX: 'REQ',
      RULES_FILE: 'rules/request-policy.yaml',
    });

    expect(config.port).toBe(8080);
    expect(config.database.max).toBe(4);
    expect(config.jwtSecret).toBe('test-secret');
    expect(config.receiptTolerance).toEqual({ quantity: 0, price: 0.05 });
    expect(config.poNumberPrefix).toBe('REQ');
    expect(config.rulesFile).toBe('rules/request-policy.yaml');
  });

  it('should treat a blank secret as unset', () => {
    expect(loadConfig({ JWT_SECRET: '' }).jwtSecret).toBeUndefined();
  });

  it('should name the invalid variable', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid configuration PORT');
    expect(() => loadConfig({ RECEIPT_QUANTITY_TOLERANCE: '-1' })).toThrow(
      'Invalid configuration RECEIPT_QUANTITY_TOLERANCE',
    );
    expect(() => loadConfig({ PO_NUMBER_PREFIX: 'po-x' })).toThrow(
      'Invalid configuration PO_NUMBER_PREFIX: must be 1-10 uppercase letters or digits',
    );
  });
});
