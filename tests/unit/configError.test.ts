import { describe, it, expect } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/index.js';

describe('config error handling', () => {
  it('throws on invalid JSON', () => {
    const tmp = path.join(process.cwd(), 'bad-probe-config.json');
    fs.writeFileSync(tmp, '{ invalid');
    try {
      expect(() => loadConfig('bad-probe-config.json')).toThrow(/Failed to parse config file/);
    } finally {
      fs.unlinkSync(tmp);
    }
  });

  it('rejects values outside the schema', () => {
    const tmp = path.join(process.cwd(), 'bad-probe-timeout.json');
    fs.writeFileSync(tmp, JSON.stringify({ probe: { connectTimeoutMs: -1 } }));
    try {
      expect(() => loadConfig('bad-probe-timeout.json')).toThrow();
    } finally {
      fs.unlinkSync(tmp);
    }
  });
});
