import { buildConfig, DEFAULT_MAX_UPLOAD_BYTES } from './configuration';

describe('buildConfig', () => {
  it('falls back to defaults', () => {
    const config = buildConfig({});

    expect(config.port).toBe(3002);
    expect(config.upload.maxBytes).toBe(DEFAULT_MAX_UPLOAD_BYTES);
    expect(config.upload.maxBytes).toBe(16777216);
    expect(config.webhooks.chatTimeoutMs).toBe(60000);
    expect(config.webhooks.docxFilenamePrefix).toBe('demand_letter');
    expect(config.dispatch.concurrency).toBe(4);
    expect(config.database).toEqual({
      path: 'demand_letters.db',
      synchronize: true,
      busyTimeoutMs: 5000,
      writeRetries: 5,
    });
    expect(config.history.filenameCaseSensitive).toBe(false);
  });

  it('reads overrides from the environment', () => {
    const config = buildConfig({
      PORT: '8080',
      DATABASE_PATH: ':memory:',
      DISPATCH_CONCURRENCY: '2',
      HISTORY_FILENAME_CASE_SENSITIVE: 'TRUE',
      DOCUMENT_WEBHOOK_URL: 'http://webhook.test/document',
    });

    expect(config.port).toBe(8080);
    expect(config.database.path).toBe(':memory:');
    expect(config.dispatch.concurrency).toBe(2);
    expect(config.history.filenameCaseSensitive).toBe(true);
    expect(config.webhooks.documentUrl).toBe('http://webhook.test/document');
  });

  it('treats blank values as unset', () => {
    expect(buildConfig({ PORT: '  ' }).port).toBe(3002);
  });

  it.each([
    [{ PORT: 'eighty' }, 'PORT must be an integer, got "eighty"'],
    [{ DISPATCH_CONCURRENCY: '0' }, 'DISPATCH_CONCURRENCY must be >= 1, got 0'],
    [
      { DATABASE_SYNCHRONIZE: 'maybe' },
      'DATABASE_SYNCHRONIZE must be true or false, got "maybe"',
    ],
  ])('rejects %j', (env, message) => {
    expect(() => buildConfig(env)).toThrow(message);
  });
});
