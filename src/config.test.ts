import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { ConfigManager } from './config';
import { ConfigurationError } from './errors';

const silent = pino({ level: 'silent' });

describe('ConfigManager', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'image-updater-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tmpDir, 'config.json');
    fs.writeFileSync(file, content);
    return file;
  }

  test('should return defaults with an empty environment', () => {
    expect(new ConfigManager({}, silent).load()).toEqual({
      checkInterval: 300,
      forcePullPolicy: false,
      registryTimeout: 10,
      namespace: '',
      insecureRegistries: [],
      healthPort: 8080,
    });
  });

  test('should read environment variables', () => {
    const config = new ConfigManager(
      {
        CHECK_INTERVAL: '60',
        AUTOMATICALLY_SET_IMAGE_PULL_POLICY_TO_ALWAYS: 'TRUE',
        REGISTRY_TIMEOUT: '2.5',
        WATCH_NAMESPACE: ' shop ',
        INSECURE_REGISTRIES: 'localhost:5000, registry.local ,',
        REGISTRY_AUTH_FILE: '/etc/auth/config.json',
        HEALTH_PORT: '0',
      },
      silent
    ).load();

    expect(config).toEqual({
      checkInterval: 60,
      forcePullPolicy: true,
      registryTimeout: 2.5,
      namespace: 'shop',
      insecureRegistries: ['localhost:5000', 'registry.local'],
      registryAuthFile: '/etc/auth/config.json',
      healthPort: 0,
    });
  });

  test('should only enable pull policy override for "true"', () => {
    const config = new ConfigManager({ AUTOMATICALLY_SET_IMAGE_PULL_POLICY_TO_ALWAYS: 'yes' }, silent).load();

    expect(config.forcePullPolicy).toBe(false);
  });

  test('should layer file, environment and overrides', () => {
    const file = writeConfig(JSON.stringify({ checkInterval: 120, namespace: 'from-file', healthPort: 9090 }));
    const manager = new ConfigManager({ IMAGE_UPDATER_CONFIG: file, CHECK_INTERVAL: '90' }, silent);

    const config = manager.load({ namespace: 'from-flag', forcePullPolicy: undefined });

    expect(config.checkInterval).toBe(90);
    expect(config.namespace).toBe('from-flag');
    expect(config.healthPort).toBe(9090);
    expect(config.forcePullPolicy).toBe(false);
  });

  test('should ignore a config file with wrong field types', () => {
    const file = writeConfig(JSON.stringify({ checkInterval: 'often' }));

    expect(new ConfigManager({ IMAGE_UPDATER_CONFIG: file }, silent).load().checkInterval).toBe(300);
  });

  test('should ignore a config file that is not JSON', () => {
    const file = writeConfig('checkInterval: 5');

    expect(new ConfigManager({ IMAGE_UPDATER_CONFIG: file }, silent).load().checkInterval).toBe(300);
  });

  test('should ignore a missing config file', () => {
    const file = path.join(tmpDir, 'absent.json');

    expect(new ConfigManager({ IMAGE_UPDATER_CONFIG: file }, silent).load().registryTimeout).toBe(10);
  });

  test.each<[Record<string, string>, string]>([
    [{ CHECK_INTERVAL: 'soon' }, 'CHECK_INTERVAL must be a number, got "soon"'],
    [{ CHECK_INTERVAL: '' }, 'CHECK_INTERVAL must be a number, got ""'],
    [{ CHECK_INTERVAL: '0' }, 'checkInterval must be a positive number of seconds, got 0'],
    [{ REGISTRY_TIMEOUT: '-1' }, 'registryTimeout must be a positive number of seconds, got -1'],
    [{ HEALTH_PORT: '80.5' }, 'healthPort must be an integer between 0 and 65535, got 80.5'],
    [{ HEALTH_PORT: '70000' }, 'healthPort must be an integer between 0 and 65535, got 70000'],
  ])('should reject %j', (env, message) => {
    const manager = new ConfigManager(env, silent);

    expect(() => manager.load()).toThrow(ConfigurationError);
    expect(() => manager.load()).toThrow(message);
  });

  test('should reject an invalid override', () => {
    expect(() => new ConfigManager({}, silent).load({ checkInterval: Number.NaN })).toThrow(
      'checkInterval must be a positive number of seconds, got NaN'
    );
  });
});
