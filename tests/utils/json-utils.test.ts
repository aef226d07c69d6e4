import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { parseJson, parseJsonFile } from '../../src/utils/json-utils.js';

const CounterSchema = z.object({ name: z.string(), count: z.number() });

describe('json-utils', () => {
  describe('parseJson', () => {
    it('should parse valid JSON against a schema', () => {
      const result = parseJson('{"name": "test", "count": 3}', CounterSchema);

      expect(result).toEqual({ success: true, data: { name: 'test', count: 3 } });
    });

    it('should report invalid JSON', () => {
      const result = parseJson('{ not json', CounterSchema);

      expect(result.success).toBe(false);
    });

    it('should report schema violations with their path', () => {
      const result = parseJson('{"name": "test", "count": "three"}', CounterSchema);

      expect(result).toEqual({
        success: false,
        error: 'Validation failed: count: Expected number, received string',
      });
    });

    it('should name the root for top-level violations', () => {
      const result = parseJson('[]', CounterSchema);

      expect(result).toEqual({
        success: false,
        error: 'Validation failed: <root>: Expected object, received array',
      });
    });

    it('should drop prototype pollution keys', () => {
      const schema = z.object({ name: z.string() }).passthrough();
      const result = parseJson('{"__proto__": {"polluted": true}, "name": "x", "nested": {"constructor": 1}}', schema);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(Object.keys(result.data)).toEqual(['name', 'nested']);
        expect(result.data.nested).toEqual({});
      }
      expect(Object.prototype).not.toHaveProperty('polluted');
    });
  });

  describe('parseJsonFile', () => {
    let dir: string | undefined;

    afterEach(() => {
      if (dir) {
        fs.rmSync(dir, { recursive: true, force: true });
        dir = undefined;
      }
    });

    it('should read and validate a file', async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-utils-'));
      const file = path.join(dir, 'counter.json');
      fs.writeFileSync(file, JSON.stringify({ name: 'file', count: 1 }));

      expect(await parseJsonFile(file, CounterSchema)).toEqual({
        success: true,
        data: { name: 'file', count: 1 },
      });
    });

    it('should report a missing file', async () => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'json-utils-'));
      const result = await parseJsonFile(path.join(dir, 'missing.json'), CounterSchema);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toContain('ENOENT');
      }
    });
  });
});
