import { describe, it, expect } from 'vitest';
import { AppConfigSchema, DEFAULT_APP_CONFIG } from './schema.js';

describe('AppConfigSchema', () => {
  it('fills every field from an empty object', () => {
    expect(AppConfigSchema.parse({})).toEqual({
      log_level: 'info',
      openvpn_binary: 'openvpn',
      acs_ports: [35001],
      connect_timeout_seconds: 0,
      teardown_grace_ms: 5000,
      auth: { open_browser: true },
    });
  });

  it('keeps partial overrides and defaults the rest', () => {
    const config = AppConfigSchema.parse({
      acs_ports: [35001, 35002],
      auth: { login_url: 'https://idp.example.test/sso' },
    });

    expect(config.acs_ports).toEqual([35001, 35002]);
    expect(config.auth).toEqual({ login_url: 'https://idp.example.test/sso', open_browser: true });
    expect(config.openvpn_binary).toBe('openvpn');
  });

  it('rejects an empty port list', () => {
    expect(AppConfigSchema.safeParse({ acs_ports: [] }).success).toBe(false);
  });

  it('rejects ports outside 1-65535', () => {
    expect(AppConfigSchema.safeParse({ acs_ports: [0] }).success).toBe(false);
    expect(AppConfigSchema.safeParse({ acs_ports: [70000] }).success).toBe(false);
  });

  it('rejects unknown log levels', () => {
    expect(AppConfigSchema.safeParse({ log_level: 'verbose' }).success).toBe(false);
  });

  it('rejects a negative timeout', () => {
    expect(AppConfigSchema.safeParse({ connect_timeout_seconds: -1 }).success).toBe(false);
  });

  it('rejects a login_url that is not a URL', () => {
    expect(AppConfigSchema.safeParse({ auth: { login_url: 'not a url' } }).success).toBe(false);
  });
});

describe('DEFAULT_APP_CONFIG', () => {
  it('equals the parsed empty config', () => {
    expect(DEFAULT_APP_CONFIG).toEqual(AppConfigSchema.parse({}));
  });
});
