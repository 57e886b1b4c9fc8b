import type { UserSummary } from '../types/message.types';

export const PREVIEW_LENGTH = 100;

/** Character (code point) length, so astral symbols count once. */
export const charLength = (value: string): number => Array.from(value).length;

/** Hard cut at `max` characters, `...` appended only when something was cut. */
export const preview = (content: string, max = PREVIEW_LENGTH): string => {
  const chars = Array.from(content);
  if (chars.length <= max) return content;
  return `${chars.slice(0, max).join('')}...`;
};

export const displayName = (user: Pick<UserSummary, 'username' | 'firstName' | 'lastName'>): string => {
  const fullName = `${user.firstName} ${user.lastName}`.trim();
  return fullName || user.username;
};
