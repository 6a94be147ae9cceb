import { describe, it, expect, afterEach } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  const saved = process.env['KVGAS_LOG_LEVEL'];

  afterEach(() => {
    if (saved === undefined) {
      delete process.env['KVGAS_LOG_LEVEL'];
    } else {
      process.env['KVGAS_LOG_LEVEL'] = saved;
    }
  });

  it('defaults to info', () => {
    delete process.env['KVGAS_LOG_LEVEL'];
    expect(createLogger().level).toBe('info');
  });

  it('reads the level from KVGAS_LOG_LEVEL', () => {
    process.env['KVGAS_LOG_LEVEL'] = 'warn';
    expect(createLogger().level).toBe('warn');
  });

  it('prefers an explicit level', () => {
    process.env['KVGAS_LOG_LEVEL'] = 'warn';
    expect(createLogger({ level: 'debug' }).level).toBe('debug');
  });

  it('writes named JSON lines to the destination', () => {
    const lines: string[] = [];
    const logger = createLogger({
      level: 'info',
      destination: {
        write(msg: string): void {
          lines.push(msg);
        },
      },
    });

    logger.info({ unit: 'tx' }, 'hello');

    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0] ?? '{}') as Record<string, unknown>;
    expect(parsed['name']).toBe('kvgas');
    expect(parsed['msg']).toBe('hello');
    expect(parsed['unit']).toBe('tx');
  });
});
