import { loadConfig, findCompany, DEFAULT_IMAP_HOST } from '../src/config';
import { ConfigurationError } from '../src/utils/errors';

jest.mock('../src/utils/logger');

describe('loadConfig', () => {
  const baseEnv = {
    COMPANY_COUNT: '2',
    COMPANY_1_NAME: 'Acme',
    COMPANY_1_EMAIL: 'billing@acme.test',
    COMPANY_1_EMAIL_PASSWORD: 'test-secret',
    COMPANY_2_NAME: 'Globex',
    COMPANY_2_WALMART_USERNAME: 'buyer@globex.test',
    COMPANY_2_WALMART_PASSWORD: 'test-secret',
    COMPANY_2_AMAZON_USERNAME: 'buyer@globex.test',
    COMPANY_2_AMAZON_PASSWORD: 'test-secret',
  };

  test('should build one record per company with only configured channels', () => {
    const config = loadConfig(baseEnv);

    expect(config.companies).toHaveLength(2);
    expect(config.companies[0]).toEqual({
      name: 'Acme',
      email: {
        address: 'billing@acme.test',
        password: 'test-secret',
        imapHost: DEFAULT_IMAP_HOST,
        imapPort: 993,
        mailbox: 'INBOX',
      },
    });
    expect(config.companies[1].email).toBeUndefined();
    expect(config.companies[1].walmart).toEqual({ username: 'buyer@globex.test', password: 'test-secret' });
    expect(config.companies[1].amazon).toEqual({ username: 'buyer@globex.test', password: 'test-secret' });
  });

  test('should apply directory defaults and overrides', () => {
    expect(loadConfig(baseEnv)).toMatchObject({
      downloadsDir: './downloads',
      sessionsDir: './sessions',
      profilesDir: './browser-profiles',
    });

    const config = loadConfig({ ...baseEnv, BASE_DOWNLOAD_PATH: '/data/invoices', CHROME_PATH: '/opt/chrome' });
    expect(config.downloadsDir).toBe('/data/invoices');
    expect(config.chromePath).toBe('/opt/chrome');
  });

  test('should read custom IMAP settings', () => {
    const config = loadConfig({
      ...baseEnv,
      COMPANY_1_IMAP_SERVER: 'mail.acme.test',
      COMPANY_1_IMAP_PORT: '143',
      COMPANY_1_IMAP_MAILBOX: 'Invoices',
    });

    expect(config.companies[0].email).toMatchObject({ imapHost: 'mail.acme.test', imapPort: 143, mailbox: 'Invoices' });
  });

  test('should default the company name', () => {
    const config = loadConfig({ COMPANY_COUNT: '1' });
    expect(config.companies).toEqual([{ name: 'Company_1' }]);
  });

  test('should treat empty values as unset', () => {
    const config = loadConfig({ COMPANY_COUNT: '1', COMPANY_1_NAME: 'Acme', COMPANY_1_EMAIL: '  ' });
    expect(config.companies[0].email).toBeUndefined();
  });

  test('should return no companies without COMPANY_COUNT', () => {
    expect(loadConfig({}).companies).toEqual([]);
  });

  test('should freeze company records', () => {
    const config = loadConfig(baseEnv);
    expect(Object.isFrozen(config.companies[0])).toBe(true);
    expect(Object.isFrozen(config.companies[0].email)).toBe(true);
  });

  describe('invalid configuration', () => {
    test('should reject a non-integer COMPANY_COUNT', () => {
      expect(() => loadConfig({ COMPANY_COUNT: 'two' })).toThrow(ConfigurationError);
    });

    test('should reject an email block without password', () => {
      const env = { ...baseEnv, COMPANY_1_EMAIL_PASSWORD: '' };
      expect(() => loadConfig(env)).toThrow('COMPANY_1_email.password is required');
    });

    test('should reject a malformed email address', () => {
      const env = { ...baseEnv, COMPANY_1_EMAIL: 'not-an-address' };
      expect(() => loadConfig(env)).toThrow('COMPANY_1_email.address must be an email address');
    });

    test('should reject a malformed port', () => {
      const env = { ...baseEnv, COMPANY_1_IMAP_PORT: 'abc' };
      expect(() => loadConfig(env)).toThrow(ConfigurationError);
    });

    test('should reject a portal block without password', () => {
      const env = { ...baseEnv, COMPANY_2_AMAZON_PASSWORD: undefined };
      expect(() => loadConfig(env)).toThrow('COMPANY_2_amazon.password is required');
    });

    test('should reject company names with path separators', () => {
      const env = { ...baseEnv, COMPANY_1_NAME: '../Acme' };
      expect(() => loadConfig(env)).toThrow('must not contain path separators');
    });

    test('should reject duplicate company names regardless of case', () => {
      const env = { ...baseEnv, COMPANY_2_NAME: 'ACME' };
      expect(() => loadConfig(env)).toThrow('Duplicate company name: ACME');
    });

    test('should reject names that share a session file and download folder', () => {
      expect(() =>
        loadConfig({ COMPANY_COUNT: '2', COMPANY_1_NAME: 'Acme:West', COMPANY_2_NAME: 'acme_west' })
      ).toThrow('Company names Acme:West and acme_west map to the same folder');
    });
  });
});

describe('findCompany', () => {
  test('should match names case-insensitively', () => {
    const config = loadConfig({ COMPANY_COUNT: '1', COMPANY_1_NAME: 'Acme' });
    expect(findCompany(config, ' acme ')?.name).toBe('Acme');
    expect(findCompany(config, 'Initech')).toBeUndefined();
  });
});
