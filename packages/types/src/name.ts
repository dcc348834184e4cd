/**
 * 階層名（ドット区切りのキー）
 */

import { InvalidNameError } from './errors.js';

/** 名前全体の最大長 */
export const MAX_NAME_LENGTH = 200;

const SEGMENT_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/;

/**
 * 検証済みの階層名
 *
 * フラットなキー（インデックス・本文の参照用）と
 * セグメント列（ツリー表示・祖先の集約用）の両方を公開する。
 *
 * @example
 * const name = DocumentName.parse('auth.jwt.middleware');
 * name.segments; // ['auth', 'jwt', 'middleware']
 * name.parent?.key; // 'auth.jwt'
 */
export class DocumentName {
  private constructor(public readonly segments: readonly string[]) {}

  /**
   * 文字列を検証して階層名に変換
   * @throws InvalidNameError 文法に合わない場合
   */
  static parse(raw: string): DocumentName {
    const problem = DocumentName.check(raw);
    if (problem) {
      throw new InvalidNameError(raw, problem);
    }
    return new DocumentName(raw.split('.'));
  }

  /**
   * 文法に合うかどうか
   */
  static isValid(raw: string): boolean {
    return DocumentName.check(raw) === null;
  }

  /**
   * 問題があればその説明を返す
   */
  private static check(raw: string): string | null {
    if (raw.length === 0) {
      return 'name must not be empty';
    }
    if (raw.length > MAX_NAME_LENGTH) {
      return `name must be at most ${MAX_NAME_LENGTH} characters`;
    }
    if (raw.startsWith('.') || raw.endsWith('.')) {
      return 'name must not start or end with a dot';
    }
    if (raw.includes('..')) {
      return 'name must not contain consecutive dots';
    }
    if (!/^[a-z]/.test(raw)) {
      return 'name must start with a lowercase letter';
    }

    for (const segment of raw.split('.')) {
      if (!SEGMENT_PATTERN.test(segment)) {
        return `segment '${segment}' may only contain lowercase letters, digits and inner hyphens`;
      }
    }

    return null;
  }

  /** フラットなキー */
  get key(): string {
    return this.segments.join('.');
  }

  /** 末端のセグメント */
  get leaf(): string {
    return this.segments[this.segments.length - 1];
  }

  /** 親の階層名（最上位ならnull） */
  get parent(): DocumentName | null {
    if (this.segments.length === 1) {
      return null;
    }
    return new DocumentName(this.segments.slice(0, -1));
  }

  /**
   * 祖先を上位から順に返す（自身は含まない）
   */
  ancestors(): DocumentName[] {
    const result: DocumentName[] = [];
    for (let current = this.parent; current; current = current.parent) {
      result.unshift(current);
    }
    return result;
  }

  toString(): string {
    return this.key;
  }
}
