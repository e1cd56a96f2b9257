import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { bindProviderSettings, loadProviderSettings, type RawInstanceSettings } from './settings-yaml';
import { RegistrationErrorCode } from '../core/errors';
import { RegistrationLedger } from '../core/ledger';
import { silentLogger } from '../core/logger';
import { SecretsProviderRegistrar } from '../core/registrar';
import { unwrap } from '../core/result';
import { SecretsProviderInstanceSettings, countInstances } from '../providers/settings';

class VaultInstanceSettings extends SecretsProviderInstanceSettings {
  namespace?: string;
}

function createVaultInstance(_key: string, raw: RawInstanceSettings): VaultInstanceSettings {
  const settings = new VaultInstanceSettings(raw);
  if (typeof raw.namespace === 'string') {
    settings.namespace = raw.namespace;
  }
  return settings;
}

describe('bindProviderSettings', () => {
  it('binds instances and tracing', () => {
    const result = bindProviderSettings(
      {
        tracing: false,
        instances: {
          primary: { endpoint: 'https://vault.local/a', identifier: 'main', namespace: 'team-a' },
        },
      },
      createVaultInstance
    );

    expect(result.ok).toBe(true);
    if (result.ok && result.value) {
      expect(result.value.tracing).toBe(false);
      const primary = result.value.instances.get('primary');
      expect(primary).toBeInstanceOf(VaultInstanceSettings);
      expect(primary?.endpoint).toBe('https://vault.local/a');
      expect(primary?.identifier).toBe('main');
      expect(primary?.namespace).toBe('team-a');
    }
  });

  it('defaults tracing to true', () => {
    const result = bindProviderSettings({ instances: {} }, createVaultInstance);
    expect(result.ok && result.value?.tracing).toBe(true);
  });

  it('returns null for absent settings', () => {
    expect(bindProviderSettings(undefined, createVaultInstance)).toEqual({ ok: true, value: null });
    expect(bindProviderSettings(null, createVaultInstance)).toEqual({ ok: true, value: null });
  });

  it('treats a missing instances section as zero instances', () => {
    const result = bindProviderSettings({ tracing: true }, createVaultInstance);
    expect(result.ok && result.value?.instances.size).toBe(0);
  });

  it('keeps null instance entries as null', () => {
    const result = bindProviderSettings({ instances: { primary: null } }, createVaultInstance);
    expect(result.ok && result.value?.instances).toEqual(new Map([['primary', null]]));
  });

  it('binds an instance without an endpoint to an empty endpoint', () => {
    const result = bindProviderSettings({ instances: { primary: { identifier: 'x' } } }, createVaultInstance);
    expect(result.ok && result.value?.instances.get('primary')?.endpoint).toBe('');
  });

  it('rejects values of the wrong type', () => {
    const result = bindProviderSettings(
      { tracing: 'yes', instances: { primary: { endpoint: 42 } } },
      createVaultInstance
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(RegistrationErrorCode.INVALID_CONFIGURATION);
      expect(result.error.message).toMatch(/^Invalid provider settings: /);
      expect(result.error.message).toContain('/tracing');
    }
  });

  it('rejects integer-like instance keys', () => {
    const result = bindProviderSettings(
      {
        instances: {
          '2': { endpoint: 'https://vault.local/a' },
          primary: { endpoint: 'https://vault.local/b' },
          '1': { endpoint: 'https://vault.local/a' },
        },
      },
      createVaultInstance
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(RegistrationErrorCode.INVALID_CONFIGURATION);
      expect(result.error.message).toBe('Invalid provider settings: instance keys must not be integers (1, 2)');
    }
  });

  it('accepts keys that only look numeric', () => {
    const result = bindProviderSettings(
      { instances: { '01': { endpoint: 'https://vault.local/a' }, 'node-1': { endpoint: 'https://vault.local/b' } } },
      createVaultInstance
    );
    expect(result.ok && [...(result.value?.instances.keys() ?? [])]).toEqual(['01', 'node-1']);
  });

  it('binds an instance named __proto__ like any other key', () => {
    const raw: unknown = JSON.parse('{"instances":{"__proto__":{"endpoint":"https://vault.local/a"}}}');
    const result = bindProviderSettings(raw, createVaultInstance);

    expect(result.ok).toBe(true);
    if (result.ok && result.value) {
      expect(countInstances(result.value)).toBe(1);
      expect([...result.value.instances.keys()]).toEqual(['__proto__']);
      expect(result.value.instances.get('__proto__')?.endpoint).toBe('https://vault.local/a');
    }
  });

  it('rejects a non-object section', () => {
    const result = bindProviderSettings('vault', createVaultInstance);
    expect(!result.ok && result.error.code).toBe(RegistrationErrorCode.INVALID_CONFIGURATION);
  });
});

describe('loadProviderSettings', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'secrets-settings-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  it('loads a nested YAML section', () => {
    const filePath = write('app.yaml', [
      'secrets:',
      '  vault:',
      '    tracing: true',
      '    instances:',
      '      primary:',
      '        endpoint: https://vault.local/a',
      '      secondary:',
      '        endpoint: https://vault.local/b',
      '        identifier: backup',
      '',
    ].join('\n'));

    const result = loadProviderSettings(filePath, 'secrets.vault', createVaultInstance);

    expect(result.ok).toBe(true);
    if (result.ok && result.value) {
      expect([...result.value.instances.keys()]).toEqual(['primary', 'secondary']);
      expect(result.value.instances.get('secondary')?.identifier).toBe('backup');
    }
  });

  it('registers an instance named __proto__ loaded from YAML', async () => {
    const filePath = write('app.yaml', [
      'vault:',
      '  instances:',
      '    __proto__:',
      '      endpoint: https://vault.local/a',
      '',
    ].join('\n'));
    const addInstance = vi.fn();
    const registrar = new SecretsProviderRegistrar<VaultInstanceSettings>(
      { providerType: 'Secrets', providerName: 'Vault', activitySourceNames: [], addInstance },
      { ledger: new RegistrationLedger(), logger: silentLogger }
    );

    const settings = unwrap(loadProviderSettings(filePath, 'vault', createVaultInstance));
    const result = await registrar.register(settings, { register: vi.fn() }, { add: vi.fn() });

    expect(unwrap(result)).toMatchObject({ skipped: false, registered: ['__proto__'] });
    expect(addInstance).toHaveBeenCalledTimes(1);
  });

  it('rejects integer-like instance keys in YAML', () => {
    const filePath = write('app.yaml', [
      'vault:',
      '  instances:',
      '    "2":',
      '      endpoint: https://vault.local/a',
      '    "1":',
      '      endpoint: https://vault.local/a',
      '',
    ].join('\n'));

    const result = loadProviderSettings(filePath, 'vault', createVaultInstance);
    expect(!result.ok && result.error.code).toBe(RegistrationErrorCode.INVALID_CONFIGURATION);
  });

  it('loads JSON files', () => {
    const filePath = write('app.json', JSON.stringify({
      tracing: false,
      instances: { primary: { endpoint: 'https://vault.local/a' } },
    }));

    const result = loadProviderSettings(filePath, '', createVaultInstance);

    expect(result.ok && result.value?.tracing).toBe(false);
    expect(result.ok && result.value?.instances.get('primary')?.endpoint).toBe('https://vault.local/a');
  });

  it('returns null when the section is missing', () => {
    const filePath = write('app.yaml', 'secrets:\n  env: {}\n');
    expect(loadProviderSettings(filePath, 'secrets.vault', createVaultInstance)).toEqual({ ok: true, value: null });
  });

  it('reports unreadable files', () => {
    const result = loadProviderSettings(path.join(tmpDir, 'missing.yaml'), 'secrets', createVaultInstance);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(RegistrationErrorCode.INVALID_CONFIGURATION);
      expect(result.error.cause).toBeInstanceOf(Error);
    }
  });

  it('reports malformed YAML', () => {
    const filePath = write('broken.yaml', 'secrets: [unclosed\n');
    const result = loadProviderSettings(filePath, 'secrets', createVaultInstance);
    expect(!result.ok && result.error.code).toBe(RegistrationErrorCode.INVALID_CONFIGURATION);
  });
});
