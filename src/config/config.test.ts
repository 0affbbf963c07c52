import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies admission defaults', () => {
    const cfg = loadConfig({});
    expect(cfg.ADMISSION_COOLDOWN_SECONDS).toBe(15);
    expect(cfg.ADMISSION_LEDGER_HORIZON_SECONDS).toBe(60);
    expect(cfg.ADMISSION_MAX_OCCUPANCY).toBe(2);
    expect(cfg.GITHUB_RETRY_COUNT).toBe(0);
    expect(cfg.ECS_SUBNET_IDS).toEqual([]);
  });

  it('coerces numbers and splits comma separated lists', () => {
    const cfg = loadConfig({
      PORT: '9000',
      ADMISSION_COOLDOWN_SECONDS: '30',
      ECS_SUBNET_IDS: 'subnet-a, subnet-b,,',
      ECS_SECURITY_GROUP_IDS: 'sg-1',
    });
    expect(cfg.PORT).toBe(9000);
    expect(cfg.ADMISSION_COOLDOWN_SECONDS).toBe(30);
    expect(cfg.ECS_SUBNET_IDS).toEqual(['subnet-a', 'subnet-b']);
    expect(cfg.ECS_SECURITY_GROUP_IDS).toEqual(['sg-1']);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ ECS_ASSIGN_PUBLIC_IP: 'MAYBE' })).toThrow();
    expect(() => loadConfig({ BACKEND_ORIGIN: 'not a url' })).toThrow();
  });

  it('refuses a cooldown longer than the ledger horizon', () => {
    expect(() => loadConfig({ ADMISSION_COOLDOWN_SECONDS: '90', ADMISSION_LEDGER_HORIZON_SECONDS: '60' })).toThrow(
      'ADMISSION_COOLDOWN_SECONDS must not exceed ADMISSION_LEDGER_HORIZON_SECONDS'
    );
    expect(loadConfig({ ADMISSION_COOLDOWN_SECONDS: '60', ADMISSION_LEDGER_HORIZON_SECONDS: '60' }).ADMISSION_COOLDOWN_SECONDS).toBe(60);
  });
});
