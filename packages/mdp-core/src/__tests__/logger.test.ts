import { describe, it, expect } from 'vitest';
import { createConsoleLogger } from '../logger.js';

const createSink = () => {
  const lines: string[] = [];
  return { lines, write: (chunk: string) => lines.push(chunk) };
};

describe('createConsoleLogger', () => {
  it('should drop lines below the level', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: 'warn', stream: sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.lines).toEqual(['[warn] shown\n']);
  });

  it('should append metadata as JSON', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: 'debug', stream: sink });

    logger.debug('Computed iteration', { iteration: 3 });
    logger.info('no meta', {});

    expect(sink.lines).toEqual(['[debug] Computed iteration {"iteration":3}\n', '[info] no meta\n']);
  });

  it('should include the error message', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ stream: sink });

    logger.error('solve failed', new Error('boom'));
    logger.error('plain');

    expect(sink.lines).toEqual(['[error] solve failed: boom\n', '[error] plain\n']);
  });

  it('should write nothing when silent', () => {
    const sink = createSink();
    const logger = createConsoleLogger({ level: 'silent', stream: sink });

    logger.error('quiet');

    expect(sink.lines).toEqual([]);
  });
});
