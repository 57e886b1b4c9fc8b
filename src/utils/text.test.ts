import { describe, expect, it } from 'vitest';
import { PREVIEW_LENGTH, charLength, displayName, preview } from './text';

describe('preview', () => {
  it('leaves short content alone', () => {
    expect(preview('hello')).toBe('hello');
    expect(preview('a'.repeat(PREVIEW_LENGTH))).toBe('a'.repeat(PREVIEW_LENGTH));
  });

  it('cuts at the limit and marks the cut', () => {
    expect(preview('a'.repeat(PREVIEW_LENGTH + 1))).toBe(`${'a'.repeat(PREVIEW_LENGTH)}...`);
    expect(preview('abcdef', 3)).toBe('abc...');
  });

  it('never splits a surrogate pair', () => {
    expect(preview('😀'.repeat(5), 2)).toBe('😀😀...');
    expect(charLength('😀😀')).toBe(2);
  });
});

describe('displayName', () => {
  it('prefers the full name', () => {
    expect(displayName({ username: 'alice', firstName: 'Alice', lastName: 'Smith' })).toBe('Alice Smith');
    expect(displayName({ username: 'carol', firstName: 'Carol', lastName: '' })).toBe('Carol');
    expect(displayName({ username: 'dave', firstName: '', lastName: 'Jones' })).toBe('Jones');
  });

  it('falls back to the username', () => {
    expect(displayName({ username: 'bob', firstName: '', lastName: '' })).toBe('bob');
  });
});
