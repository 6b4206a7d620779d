import { emojify } from 'node-emoji';

export type TextTransform = (text: string) => string;

/**
 * Expands `:alias:` emoji codes; unknown codes are left as typed.
 */
export const emoteTransform: TextTransform = (text) => emojify(text);

export const identityTransform: TextTransform = (text) => text;
