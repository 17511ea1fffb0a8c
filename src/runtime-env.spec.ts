import { readAppConfig } from './runtime-env';

describe('readAppConfig', () => {
  it('falls back to the defaults', () => {
    expect(readAppConfig({})).toEqual({
      port: 3000,
      seedSampleData: true,
      corsOrigin: true,
    });
  });

  it('reads the port, seeding switch and CORS origin', () => {
    expect(
      readAppConfig({
        PORT: '8080',
        SEED_SAMPLE_DATA: 'FALSE',
        CORS_ORIGIN: 'https://bom.example.test',
      }),
    ).toEqual({
      port: 8080,
      seedSampleData: false,
      corsOrigin: 'https://bom.example.test',
    });
  });

  it('can switch CORS off', () => {
    expect(readAppConfig({ CORS_ORIGIN: 'false' }).corsOrigin).toBe(false);
  });

  it('rejects an invalid port', () => {
    expect(() => readAppConfig({ PORT: 'eighty' })).toThrow(
      "PORT must be an integer between 1 and 65535, got 'eighty'.",
    );
  });
});
