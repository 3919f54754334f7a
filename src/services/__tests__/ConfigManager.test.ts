import { describe, it, expect, beforeEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { ConfigManager } from '../ConfigManager.js';
import { AppConfig } from '../../types/config.js';

// Mock fs module
vi.mock('fs', () => ({
  promises: {
    readFile: vi.fn(),
    writeFile: vi.fn(),
    mkdir: vi.fn()
  }
}));

// Mock os module
vi.mock('os', () => ({
  homedir: vi.fn()
}));

function notFound(): Error {
  return Object.assign(new Error('File not found'), { code: 'ENOENT' });
}

describe('ConfigManager', () => {
  let configManager: ConfigManager;
  const appDir = join('/Users/testuser', '.pocket-calendar');
  const expectedConfigPath = join(appDir, 'config.json');

  const storedConfig: AppConfig = {
    storage: {
      dataDir: '/data/calendar',
      eventsFile: 'events.ics',
      categoriesFile: 'categories.json',
      similarWordsFile: 'similar-words.json'
    },
    calendar: {
      timeZone: 'Asia/Tokyo',
      productId: '-//test//EN',
      includeUid: false
    },
    server: {
      name: 'pocket-calendar',
      version: '1.0.0'
    }
  };

  beforeEach(() => {
    vi.mocked(homedir).mockReturnValue('/Users/testuser');
    configManager = new ConfigManager();
  });

  describe('loadConfig', () => {
    it('should load existing configuration from file', async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(storedConfig));

      const result = await configManager.loadConfig();

      expect(fs.mkdir).toHaveBeenCalledWith(appDir, { recursive: true });
      expect(fs.readFile).toHaveBeenCalledWith(expectedConfigPath, 'utf-8');
      expect(result).toEqual(storedConfig);
    });

    it('should create default configuration when file does not exist', async () => {
      vi.mocked(fs.readFile).mockRejectedValue(notFound());

      const result = await configManager.loadConfig();

      expect(fs.writeFile).toHaveBeenCalledWith(
        expectedConfigPath,
        expect.stringContaining('"timeZone": "UTC"'),
        'utf-8'
      );
      expect(result.storage).toEqual({
        dataDir: appDir,
        eventsFile: 'events.ics',
        categoriesFile: 'categories.json',
        similarWordsFile: 'similar-words.json'
      });
      expect(result.calendar).toEqual({ timeZone: 'UTC', productId: '-//pocket-calendar//EN', includeUid: true });
    });

    it('should use a custom configuration path', async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(storedConfig));
      const custom = new ConfigManager('/etc/pocket-calendar/config.json');

      await custom.loadConfig();

      expect(custom.getConfigPath()).toBe('/etc/pocket-calendar/config.json');
      expect(fs.mkdir).toHaveBeenCalledWith('/etc/pocket-calendar', { recursive: true });
    });

    it('should reject a file that is not JSON', async () => {
      vi.mocked(fs.readFile).mockResolvedValue('{ broken');

      await expect(configManager.loadConfig()).rejects.toThrow(/^Failed to load configuration: /);
    });

    it('should reject an unknown time zone', async () => {
      const config = { ...storedConfig, calendar: { ...storedConfig.calendar, timeZone: 'Mars/Olympus' } };
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(config));

      await expect(configManager.loadConfig()).rejects.toThrow(
        'Failed to load configuration: Configuration validation failed: calendar.timeZone timeZone must be a valid IANA time zone'
      );
    });

    it('should propagate read errors other than a missing file', async () => {
      vi.mocked(fs.readFile).mockRejectedValue(new Error('EACCES'));

      await expect(configManager.loadConfig()).rejects.toThrow('Failed to load configuration: EACCES');
      expect(fs.writeFile).not.toHaveBeenCalled();
    });
  });

  describe('getConfig', () => {
    it('should throw before the configuration is loaded', () => {
      expect(() => configManager.getConfig()).toThrow('Configuration not loaded. Call loadConfig() first.');
    });

    it('should return a copy', async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(storedConfig));
      await configManager.loadConfig();

      configManager.getConfig().calendar.timeZone = 'UTC';

      expect(configManager.getConfig().calendar.timeZone).toBe('Asia/Tokyo');
    });
  });

  describe('saveConfig', () => {
    beforeEach(async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(storedConfig));
      await configManager.loadConfig();
    });

    it('should write a valid configuration without changing the loaded one', async () => {
      const berlin = { ...storedConfig, calendar: { ...storedConfig.calendar, timeZone: 'Europe/Berlin' } };

      await configManager.saveConfig(berlin);

      expect(fs.writeFile).toHaveBeenCalledWith(expectedConfigPath, JSON.stringify(berlin, null, 2), 'utf-8');
      expect(configManager.getConfig().calendar.timeZone).toBe('Asia/Tokyo');
    });

    it('should refuse an invalid configuration before writing', async () => {
      const badZone = { ...storedConfig, calendar: { ...storedConfig.calendar, timeZone: 'Bad/Zone' } };

      await expect(configManager.saveConfig(badZone)).rejects.toThrow(
        'Failed to save configuration: Configuration validation failed: calendar.timeZone timeZone must be a valid IANA time zone'
      );
      expect(fs.writeFile).not.toHaveBeenCalled();
      expect(configManager.getConfig()).toEqual(storedConfig);
    });

    it('should resolve data file paths against the data directory', () => {
      expect(configManager.resolveStoragePath('eventsFile')).toBe(join('/data/calendar', 'events.ics'));
      expect(configManager.resolveStoragePath('similarWordsFile')).toBe(join('/data/calendar', 'similar-words.json'));
    });
  });

  it('should stay unloaded when the defaults cannot be written', async () => {
    vi.mocked(fs.readFile).mockRejectedValue(notFound());
    vi.mocked(fs.writeFile).mockRejectedValue(new Error('EROFS'));

    await expect(configManager.loadConfig()).rejects.toThrow(
      'Failed to load configuration: Failed to save configuration: EROFS'
    );
    expect(() => configManager.getConfig()).toThrow('Configuration not loaded. Call loadConfig() first.');
  });

  describe('validateConfig', () => {
    it('should accept a complete configuration', () => {
      expect(configManager.validateConfig(storedConfig)).toEqual([]);
    });

    it('should name missing sections by field', () => {
      const { calendar: _calendar, ...withoutCalendar } = storedConfig;

      expect(configManager.validateConfig(withoutCalendar)).toEqual([
        { field: 'calendar', message: "must have required property 'calendar'" }
      ]);
    });

    it('should name nested fields with dotted paths', () => {
      const errors = configManager.validateConfig({ ...storedConfig, server: { name: 'x', version: 2 } });

      expect(errors).toEqual([{ field: 'server.version', message: 'must be string' }]);
    });
  });
});
