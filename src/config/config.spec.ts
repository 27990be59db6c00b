import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, parseDuration } from './index';

describe('config', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'modal-interactions-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  const writeConfig = (contents: string): string => {
    const configPath = path.join(dir, 'config.yaml');
    fs.writeFileSync(configPath, contents);
    return configPath;
  };

  describe('loadConfig', () => {
    it('should fall back to defaults when the file is missing', () => {
      const config = loadConfig({ configPath: path.join(dir, 'missing.yaml'), env: {} });

      expect(config).toEqual({
        logging: { level: 'info' },
        discord: {
          server: 'https://discord.com',
          apiVersion: 10,
          timeout: '15s',
          userAgent: 'DiscordBot (modal-interactions, 1.0.0)',
        },
      });
    });

    it('should read the YAML file', () => {
      const configPath = writeConfig(['logging:', '  level: debug', 'discord:', '  applicationId: 123', '  timeout: 30s', ''].join('\n'));

      const config = loadConfig({ configPath, env: {} });

      expect(config.logging.level).toBe('debug');
      expect(config.discord.applicationId).toBe('123');
      expect(config.discord.timeout).toBe('30s');
      expect(config.discord.server).toBe('https://discord.com');
    });

    it('should let environment variables win over the file', () => {
      const configPath = writeConfig(['discord:', '  apiVersion: 10', ''].join('\n'));

      const config = loadConfig({
        configPath,
        env: {
          LOG_LEVEL: 'warn',
          DISCORD_API_VERSION: '9',
          DISCORD_APPLICATION_ID: '2',
          DISCORD_BOT_TOKEN: 'test-secret',
          DISCORD_HTTP_TIMEOUT: '250ms',
        },
      });

      expect(config.logging.level).toBe('warn');
      expect(config.discord.apiVersion).toBe(9);
      expect(config.discord.applicationId).toBe('2');
      expect(config.discord.botToken).toBe('test-secret');
      expect(config.discord.timeout).toBe('250ms');
    });

    it('should reject a malformed file', () => {
      const configPath = writeConfig(['discord:', '  apiVersion: ten', ''].join('\n'));
      jest.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(() => loadConfig({ configPath, env: {} })).toThrow();
    });

    it('should keep a quoted application id intact', () => {
      const configPath = writeConfig(['discord:', "  applicationId: '987654321098765432'", ''].join('\n'));

      const config = loadConfig({ configPath, env: {} });

      expect(config.discord.applicationId).toBe('987654321098765432');
    });

    it('should reject an unquoted application id that loses digits', () => {
      const configPath = writeConfig(['discord:', '  applicationId: 987654321098765432', ''].join('\n'));
      const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

      expect(() => loadConfig({ configPath, env: {} })).toThrow(
        'discord.applicationId is too large for a YAML number, quote it',
      );
      expect(consoleError).toHaveBeenCalledTimes(1);
    });

    it('should reject a malformed timeout', () => {
      expect(() => loadConfig({ configPath: path.join(dir, 'missing.yaml'), env: { DISCORD_HTTP_TIMEOUT: 'soon' } })).toThrow(
        'Invalid duration format: soon',
      );
    });
  });

  describe('parseDuration', () => {
    it('should convert units to milliseconds', () => {
      expect(parseDuration('250ms')).toBe(250);
      expect(parseDuration('15s')).toBe(15000);
      expect(parseDuration('2m')).toBe(120000);
      expect(parseDuration('1h')).toBe(3600000);
      expect(parseDuration('1d')).toBe(86400000);
    });
  });
});
