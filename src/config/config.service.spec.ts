import { ConfigService } from './config.service';

describe('ConfigService', () => {
  const saved = { ...process.env };
  let service: ConfigService;

  beforeEach(() => {
    process.env.NODE_ENV = 'test';
    process.env.DB_HOST = 'db.internal';
    process.env.ADMISSION_MIN_AGE = '18';
    process.env.BCRYPT_ROUNDS = 'ten';
    delete process.env.ADMISSION_MAX_AGE;
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    service = new ConfigService();
  });

  afterEach(() => {
    process.env = { ...saved };
    jest.restoreAllMocks();
  });

  it('reads values from process.env when no env file exists', () => {
    expect(service.get('DB_HOST')).toBe('db.internal');
  });

  it('throws for a missing required key', () => {
    expect(() => service.get('ADMISSION_MAX_AGE')).toThrow(
      'Configuration error: Missing required environment variable ADMISSION_MAX_AGE',
    );
  });

  it('falls back for optional keys', () => {
    expect(service.getOrDefault('ADMISSION_MAX_AGE', '25')).toBe('25');
    expect(service.getNumber('ADMISSION_MAX_AGE', 25)).toBe(25);
    expect(service.getNumber('ADMISSION_MIN_AGE', 17)).toBe(18);
  });

  it('rejects non-numeric values for numeric keys', () => {
    expect(() => service.getNumber('BCRYPT_ROUNDS', 10)).toThrow('BCRYPT_ROUNDS must be numeric');
  });
});
