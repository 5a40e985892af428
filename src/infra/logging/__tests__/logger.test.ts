import { describe, it, expect } from 'vitest';
import { Writable } from 'stream';
import { createLogger } from '../logger.js';

function capture() {
  const lines: string[] = [];
  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  return { lines, destination };
}

describe('createLogger', () => {
  it('should mask credentials', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ level: 'info', destination });

    logger.info(
      {
        password: 'pw12345',
        body: { password: 'pw12345', masterKey: 'test-master-key', identifier: 'alice' },
        req: { headers: { authorization: 'Bearer abc', host: 'localhost' } },
      },
      'attempt'
    );

    const line = JSON.parse(lines[0]);
    expect(line.password).toBe('****');
    expect(line.body).toEqual({ password: '****', masterKey: '****', identifier: 'alice' });
    expect(line.req.headers).toEqual({ authorization: '****', host: 'localhost' });
    expect(line.name).toBe('blog-api');
    expect(line.msg).toBe('attempt');
  });

  it('should drop lines below the level', () => {
    const { lines, destination } = capture();
    const logger = createLogger({ level: 'warn', destination });

    logger.info('quiet');
    logger.warn('loud');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).msg).toBe('loud');
  });
});
