import { describe, it, expect } from 'vitest';
import { PassThrough, Readable } from 'stream';
import { question, waitForEnter } from '../prompt';
import { ConfigError } from '../errorHandler';

describe('question', () => {
  it('should resolve with the trimmed answer', async () => {
    const output = new PassThrough();
    const input = Readable.from([Buffer.from('  Foo \n')]);

    await expect(question('Enter your Minecraft username: ', { input, output })).resolves.toBe('Foo');
  });

  it('should reject with ConfigError when the input ends without an answer', async () => {
    const output = new PassThrough();
    const input = Readable.from([]);

    const error = await question('Enter your Hypixel API key: ', { input, output }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.message).toBe('Input closed before an answer was given');
    }
  });
});

describe('waitForEnter', () => {
  it('should resolve when Enter is pressed', async () => {
    const output = new PassThrough();
    const input = Readable.from([Buffer.from('\n')]);

    await expect(waitForEnter('Press Enter to continue...', { input, output })).resolves.toBeUndefined();
  });

  it('should resolve when the input has already ended', async () => {
    const output = new PassThrough();
    const input = Readable.from([]);

    await expect(waitForEnter('Press Enter to continue...', { input, output })).resolves.toBeUndefined();
  });
});
