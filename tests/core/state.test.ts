/**
 * Tests for JsonFileProgressStore
 * Mocks filesystem operations to test progress tracking without affecting host system
 */

// Mock filesystem first
const mockFs = {
  promises: {
    mkdir: jest.fn(),
    writeFile: jest.fn(),
  },
  readFileSync: jest.fn(),
};

jest.mock('node:fs', () => mockFs);

import { JsonFileProgressStore } from '../../src/core/state.js';

const missingFile = () => {
  mockFs.readFileSync.mockImplementation(() => {
    throw Object.assign(new Error('ENOENT'), { code: 'ENOENT' });
  });
};

describe('JsonFileProgressStore', () => {
  const testPath = '/mock/state.json';

  beforeEach(() => {
    mockFs.readFileSync.mockReset();
    mockFs.promises.mkdir.mockReset();
    mockFs.promises.writeFile.mockReset();
  });

  describe('constructor', () => {
    it('should initialize with empty progress when file does not exist', () => {
      missingFile();

      const store = new JsonFileProgressStore(testPath);

      expect(store.entries()).toEqual([]);
      expect(mockFs.readFileSync).toHaveBeenCalledWith(testPath, 'utf8');
    });

    it('should load existing progress from file', () => {
      mockFs.readFileSync.mockReturnValue(
        JSON.stringify({ select: { status: 'passed', at: '2024-05-01T10:00:00.000Z' } }),
      );

      const store = new JsonFileProgressStore(testPath);

      expect(store.get('select')).toEqual({ status: 'passed', at: '2024-05-01T10:00:00.000Z' });
    });

    it('should drop entries that are not progress records', () => {
      mockFs.readFileSync.mockReturnValue(
        JSON.stringify({
          good: { status: 'failed', at: '2024-05-01T10:00:00.000Z', message: 'boom' },
          bad: { status: 3 },
          worse: 'passed',
        }),
      );

      const store = new JsonFileProgressStore(testPath);

      expect(store.entries()).toEqual([
        ['good', { status: 'failed', at: '2024-05-01T10:00:00.000Z', message: 'boom' }],
      ]);
    });

    it('should start empty on invalid JSON', () => {
      mockFs.readFileSync.mockReturnValue('invalid json');

      const store = new JsonFileProgressStore(testPath);

      expect(store.entries()).toEqual([]);
    });
  });

  describe('record', () => {
    it('should overwrite the previous outcome of an exercise', () => {
      missingFile();
      const store = new JsonFileProgressStore(testPath);

      store.record('insert', { status: 'failed', at: '2024-05-01T10:00:00.000Z' });
      store.record('insert', { status: 'passed', at: '2024-05-01T10:05:00.000Z' });

      expect(store.get('insert')).toEqual({ status: 'passed', at: '2024-05-01T10:05:00.000Z' });
      expect(store.get('toString')).toBeUndefined();
    });
  });

  describe('flush', () => {
    it('should write progress to file, creating its directory', async () => {
      missingFile();
      const store = new JsonFileProgressStore(testPath);
      store.record('table', { status: 'passed', at: '2024-05-01T10:00:00.000Z' });

      await store.flush();

      expect(mockFs.promises.mkdir).toHaveBeenCalledWith('/mock', { recursive: true });
      expect(mockFs.promises.writeFile).toHaveBeenCalledWith(
        testPath,
        JSON.stringify({ table: { status: 'passed', at: '2024-05-01T10:00:00.000Z' } }, null, 2),
      );
    });

    it('should propagate write errors', async () => {
      missingFile();
      mockFs.promises.writeFile.mockRejectedValue(new Error('Write failed'));
      const store = new JsonFileProgressStore(testPath);

      await expect(store.flush()).rejects.toThrow('Write failed');
    });
  });
});
