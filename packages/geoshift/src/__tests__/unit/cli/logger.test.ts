import { describe, it, expect } from 'vitest';
import { createCLILogger } from '../../../cli/lib/logger.js';

describe('CLILogger', () => {
  it('should write JSON lines with the command name', () => {
    const lines: string[] = [];
    const logger = createCLILogger({ level: 'info', json: true, write: (line) => lines.push(line) });

    logger.forCommand('convert').info('Converted', { to: 'GCJ02' });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({
      timestamp: expect.any(String),
      level: 'info',
      message: 'Converted',
      command: 'convert',
      to: 'GCJ02',
    });
  });

  it('should write colored human-readable lines', () => {
    const lines: string[] = [];
    const logger = createCLILogger({ level: 'debug', json: false, write: (line) => lines.push(line) });

    logger.forCommand('contains').warn('Slow polygon', { vertices: 12 });

    expect(lines[0]).toBe(
      '\x1b[33mWARN \x1b[0m \x1b[2m[contains]\x1b[0m Slow polygon \x1b[2m(\x1b[36mvertices\x1b[0m=12)\x1b[0m'
    );
  });

  it('should drop entries below the configured level', () => {
    const lines: string[] = [];
    const logger = createCLILogger({ level: 'warn', json: true, write: (line) => lines.push(line) });

    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');

    expect(lines.map((line) => JSON.parse(line).message)).toEqual(['shown']);
  });
});
