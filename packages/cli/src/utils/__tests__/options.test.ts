import { describe, it, expect, afterEach } from 'vitest';
import { ConflictError, InvalidInputError, NotFoundError } from '@archdocs/types';
import { parseFormat, parseLimit } from '../options.js';
import { exitCodeFor, runCommand } from '../errors.js';
import { captureConsole, type ConsoleCapture } from '../../__tests__/helpers/setup.js';

describe('parseFormat', () => {
  it('text と json を受け付ける', () => {
    expect(parseFormat(undefined)).toBe('text');
    expect(parseFormat('text')).toBe('text');
    expect(parseFormat('json')).toBe('json');
  });

  it('それ以外はInvalidInputError', () => {
    expect(() => parseFormat('xml')).toThrow(InvalidInputError);
    expect(() => parseFormat('xml')).toThrow("format must be 'text' or 'json' (got 'xml')");
  });
});

describe('parseLimit', () => {
  it('省略時は既定値', () => {
    expect(parseLimit(undefined, 10)).toBe(10);
    expect(parseLimit(undefined, undefined)).toBeUndefined();
  });

  it('正の整数を受け付ける', () => {
    expect(parseLimit('5', 10)).toBe(5);
  });

  it.each(['0', '-1', '1.5', 'ten'])('%s はInvalidInputError', (value) => {
    expect(() => parseLimit(value, 10)).toThrow(InvalidInputError);
  });
});

describe('exitCodeFor / runCommand', () => {
  let output: ConsoleCapture | undefined;

  afterEach(() => {
    output?.restore();
    output = undefined;
  });

  it('エラーの種類ごとの終了コード、想定外のエラーは1', () => {
    expect(exitCodeFor(new ConflictError('auth'))).toBe(3);
    expect(exitCodeFor(new NotFoundError('auth'))).toBe(4);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });

  it('成功すれば0', async () => {
    expect(await runCommand(async () => {})).toBe(0);
  });

  it('失敗すればメッセージを標準エラー出力に書き、終了コードを返す', async () => {
    output = captureConsole();
    const code = await runCommand(async () => {
      throw new NotFoundError('auth.jwt');
    });

    expect(code).toBe(4);
    expect(output.stderr()).toBe("エラー: Document 'auth.jwt' not found");
  });
});
