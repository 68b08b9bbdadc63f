import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { ConfigLoader } from '../../src/config/ConfigLoader';
import { ConfigurationError } from '../../src/core/errors';

// Mock the logger
vi.mock('../../src/core/Logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

describe('ConfigLoader', () => {
  const testConfigFolder = path.join(__dirname, '../.test-config-loader');

  const clearEnv = (): void => {
    Object.keys(process.env)
      .filter((key) => key.startsWith('TSDB_'))
      .forEach((key) => delete process.env[key]);
  };

  beforeEach(() => {
    if (!fs.existsSync(testConfigFolder)) {
      fs.mkdirSync(testConfigFolder, { recursive: true });
    }
    clearEnv();
  });

  afterEach(() => {
    if (fs.existsSync(testConfigFolder)) {
      fs.rmSync(testConfigFolder, { recursive: true });
    }
    clearEnv();
  });

  describe('load', () => {
    it('should use defaults without a configuration file', () => {
      const config = new ConfigLoader(testConfigFolder).load();

      expect(config).toEqual({
        address: 'http://127.0.0.1:6041',
        database: 'iot',
        username: 'root',
        password: 'taosdata',
        precision: 'ms',
        convertNumber: false,
        defaultNumberValue: null,
        http: {
          userAgent: 'TSDBClient',
          timeout: 0,
          insecureSkipVerify: false,
          writeEncoding: '',
        },
      });
    });

    it('should load valid YAML configuration', () => {
      const yamlContent = `
address: https://tsdb.local:6041
database: metrics
username: writer
password: test-secret
precision: us
convertNumber: true
http:
  timeout: 5000
  writeEncoding: gzip
`;
      fs.writeFileSync(path.join(testConfigFolder, 'tsdb.yaml'), yamlContent);

      const config = new ConfigLoader(testConfigFolder).load();

      expect(config.address).toBe('https://tsdb.local:6041');
      expect(config.database).toBe('metrics');
      expect(config.password).toBe('test-secret');
      expect(config.precision).toBe('us');
      expect(config.convertNumber).toBe(true);
      expect(config.http.timeout).toBe(5000);
      expect(config.http.writeEncoding).toBe('gzip');
      expect(config.http.userAgent).toBe('TSDBClient');
    });

    it('should apply connection env overrides', () => {
      process.env.TSDB_HOST = 'tsdb.internal';
      process.env.TSDB_USER = 'reader';
      process.env.TSDB_PASS = 'test-secret';
      process.env.TSDB_PREC = 's';
      process.env.TSDB_DB = 'fleet';

      const config = new ConfigLoader(testConfigFolder).load();

      expect(config.address).toBe('http://tsdb.internal:6041');
      expect(config.username).toBe('reader');
      expect(config.password).toBe('test-secret');
      expect(config.precision).toBe('s');
      expect(config.database).toBe('fleet');
    });

    it('should use TSDB_PORT with TSDB_HOST', () => {
      process.env.TSDB_HOST = 'tsdb.internal';
      process.env.TSDB_PORT = '16041';

      expect(new ConfigLoader(testConfigFolder).load().address).toBe('http://tsdb.internal:16041');
    });

    it('should ignore TSDB_PORT without TSDB_HOST', () => {
      process.env.TSDB_PORT = '16041';

      expect(new ConfigLoader(testConfigFolder).load().address).toBe('http://127.0.0.1:6041');
    });

    it('should apply nested TSDB_CLIENT_* overrides', () => {
      fs.writeFileSync(path.join(testConfigFolder, 'tsdb.yaml'), 'http:\n  timeout: 1000\n');
      process.env.TSDB_CLIENT_HTTP_TIMEOUT = '2500';
      process.env.TSDB_CLIENT_HTTP_INSECURESKIPVERIFY = 'true';
      process.env.TSDB_CLIENT_CONVERTNUMBER = 'true';

      const config = new ConfigLoader(testConfigFolder).load();

      expect(config.http.timeout).toBe(2500);
      expect(config.http.insecureSkipVerify).toBe(true);
      expect(config.convertNumber).toBe(true);
    });

    it('should let explicit overrides win', () => {
      process.env.TSDB_DB = 'fleet';

      const config = new ConfigLoader(testConfigFolder).load({ database: 'lab', http: { timeout: 100 } });

      expect(config.database).toBe('lab');
      expect(config.http.timeout).toBe(100);
      expect(config.http.userAgent).toBe('TSDBClient');
    });

    it('should list every invalid setting', () => {
      fs.writeFileSync(path.join(testConfigFolder, 'tsdb.yaml'), 'precision: fortnight\nhttp:\n  writeEncoding: brotli\n');

      const load = (): unknown => new ConfigLoader(testConfigFolder).load();

      expect(load).toThrow(ConfigurationError);
      expect(load).toThrow(/precision: /);
      expect(load).toThrow(/http\.writeEncoding: /);
    });

    it('should reject an address that is not http', () => {
      expect(() => new ConfigLoader(testConfigFolder).load({ address: 'ws://tsdb.local:6041' })).toThrow(
        'address must start with http:// or https://'
      );
    });

    it('should throw on invalid YAML', () => {
      fs.writeFileSync(path.join(testConfigFolder, 'tsdb.yaml'), 'address: [unclosed');

      expect(() => new ConfigLoader(testConfigFolder).load()).toThrow('Failed to parse YAML configuration');
    });

    it('should accept the example configuration', () => {
      fs.copyFileSync(
        path.join(__dirname, '../../config/tsdb.example.yaml'),
        path.join(testConfigFolder, 'tsdb.yaml')
      );

      const config = new ConfigLoader(testConfigFolder).load();

      expect(config.password).toBe('change-me');
      expect(config.defaultNumberValue).toBeNull();
      expect(config.http.writeEncoding).toBe('');
    });

    it('should accept an empty file', () => {
      fs.writeFileSync(path.join(testConfigFolder, 'tsdb.yaml'), '');

      expect(new ConfigLoader(testConfigFolder).load().database).toBe('iot');
    });
  });
});
