import { afterEach, describe, expect, it } from 'vitest';

import { configureLogger, getLogger } from '../src/logger.js';

afterEach(() => {
  configureLogger();
});

describe('logger', () => {
  it('writes structured lines with the service and child bindings', () => {
    const lines: string[] = [];
    configureLogger({ level: 'info', destination: { write: (msg: string) => lines.push(msg) } });

    getLogger().child({ site: 'a' }).info({ attempts: 1_000, found: 12 }, 'walk progress');
    getLogger().debug('suppressed below the configured level');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 30,
      service: 'recipe-corpus',
      site: 'a',
      attempts: 1_000,
      found: 12,
      msg: 'walk progress',
    });
    expect(entry).toHaveProperty('time', expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/));
  });

  it('stays silent until a level is configured', () => {
    const lines: string[] = [];
    configureLogger({ destination: { write: (msg: string) => lines.push(msg) } });

    getLogger().error('not written');

    expect(lines).toEqual([]);
  });
});
