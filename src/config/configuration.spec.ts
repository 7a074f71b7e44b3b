import configuration from './configuration';

describe('configuration', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('reads logging and ad settings from the environment', () => {
    process.env.LOG_LEVEL = 'debug';
    process.env.LOG_DIR = '/var/log/marketplace';
    process.env.AD_EXPIRATION_DAYS = '45';

    const config = configuration();

    expect(config.logging).toEqual({ level: 'debug', dir: '/var/log/marketplace' });
    expect(config.ads).toEqual({ expirationDays: 45 });
  });

  it('falls back to defaults when variables are unset or malformed', () => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_DIR;
    process.env.AD_EXPIRATION_DAYS = 'soon';
    process.env.PORT = '';

    const config = configuration();

    expect(config.logging).toEqual({ level: 'info', dir: undefined });
    expect(config.ads.expirationDays).toBe(30);
    expect(config.app.port).toBe(3000);
  });
});
