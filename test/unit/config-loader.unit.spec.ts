/**
 * Unit tests for ConfigLoader
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { channelPrefix, ConfigLoader } from '../../src/config/config-loader';
import { ConfigurationError } from '../../src/errors';

describe('ConfigLoader', () => {
  let tempDir: string;

  const writeFile = (name: string, content: string): string => {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'controller-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('resolveSettings', () => {
    it('falls back to defaults', () => {
      const settings = ConfigLoader.resolveSettings({}, {});

      expect(settings).toEqual({
        configPath: path.resolve('config.yaml'),
        valuesPath: path.resolve('values.yaml'),
      });
    });

    it('reads environment variables', () => {
      const settings = ConfigLoader.resolveSettings({}, {
        CONFIG_PATH: '/etc/controller/config.yaml',
        VALUES_PATH: '/etc/controller/values.yaml',
        LOG_LEVEL: 'DEBUG',
        CHANNEL_API_PORT: '9000',
      });

      expect(settings).toEqual({
        configPath: '/etc/controller/config.yaml',
        valuesPath: '/etc/controller/values.yaml',
        logLevel: 'debug',
        apiPort: 9000,
      });
    });

    it('prefers command-line flags over the environment', () => {
      const settings = ConfigLoader.resolveSettings(
        { config: '/opt/config.yaml', logLevel: 'warn', apiPort: 8000 },
        { CONFIG_PATH: '/etc/config.yaml', LOG_LEVEL: 'debug', CHANNEL_API_PORT: '9000' }
      );

      expect(settings.configPath).toBe('/opt/config.yaml');
      expect(settings.logLevel).toBe('warn');
      expect(settings.apiPort).toBe(8000);
    });

    it('rejects unknown log levels', () => {
      expect(() => ConfigLoader.resolveSettings({ logLevel: 'verbose' }, {})).toThrow('Invalid log level: verbose');
    });

    it('rejects a non-numeric port', () => {
      expect(() => ConfigLoader.resolveSettings({}, { CHANNEL_API_PORT: 'http' })).toThrow(ConfigurationError);
    });
  });

  describe('load', () => {
    it('loads and validates both files', () => {
      const configPath = writeFile('config.yaml', [
        'prefix: "TEST:PREFIX"',
        'channelApi:',
        '  port: 5000',
        'tasks:',
        '  - name: iocmng',
        '    module: iocmng',
        '    parameters:',
        '      update_rate: 0.1',
        '    pvs:',
        '      outputs:',
        '        LEVEL:',
        '          type: double',
      ].join('\n'));
      const valuesPath = writeFile('values.yaml', [
        'beamline: sparc',
        'namespace: control',
        'epicsConfiguration:',
        '  iocs:',
        '    - name: motor-a',
      ].join('\n'));

      const { config, values } = new ConfigLoader({ config: configPath, values: valuesPath }, {}).load();

      expect(config.prefix).toBe('TEST:PREFIX');
      expect(config.channelApi).toEqual({ enabled: true, host: '0.0.0.0', port: 5000 });
      expect(config.tasks).toEqual([
        {
          name: 'iocmng',
          module: 'iocmng',
          parameters: { update_rate: 0.1 },
          pvs: { inputs: {}, outputs: { LEVEL: { type: 'float' } } },
        },
      ]);
      expect(values.beamline).toBe('sparc');
      expect(values.epicsConfiguration.iocs).toEqual([{ name: 'motor-a' }]);
    });

    it('treats an empty file as defaults', () => {
      const configPath = writeFile('config.yaml', '');

      const config = ConfigLoader.loadControllerConfig(configPath);

      expect(config.tasks).toEqual([]);
      expect(config.channelApi.port).toBe(48485);
    });

    it('reports a missing file as a configuration error', () => {
      expect(() => ConfigLoader.loadBeamlineValues(path.join(tempDir, 'missing.yaml'))).toThrow(ConfigurationError);
    });

    it('reports schema violations with their path', () => {
      const configPath = writeFile('config.yaml', 'tasks:\n  - name: iocmng\n');

      expect(() => ConfigLoader.loadControllerConfig(configPath)).toThrow(/tasks\.0\.module/);
    });

    it('reports invalid YAML', () => {
      const configPath = writeFile('config.yaml', 'tasks: [unclosed');

      expect(() => ConfigLoader.loadControllerConfig(configPath)).toThrow(ConfigurationError);
    });
  });

  describe('channelPrefix', () => {
    it('joins beamline and namespace in upper case', () => {
      const config = ConfigLoader.loadControllerConfig(writeFile('config.yaml', '{}'));
      const values = ConfigLoader.loadBeamlineValues(writeFile('values.yaml', 'beamline: sparc\nnamespace: control\n'));

      expect(channelPrefix(config, values)).toBe('SPARC:CONTROL');
    });

    it('honours an explicit prefix', () => {
      const config = ConfigLoader.loadControllerConfig(writeFile('config.yaml', 'prefix: LAB:TEST\n'));
      const values = ConfigLoader.loadBeamlineValues(writeFile('values.yaml', '{}'));

      expect(channelPrefix(config, values)).toBe('LAB:TEST');
    });
  });
});
