// src/core/combinator/chars.ts
// Character classes shared by the leaf parsers

export const isDigit = (c: string): boolean => c >= "0" && c <= "9";

export const isLetter = (c: string): boolean => /^\p{L}$/u.test(c);

export const isAlphanumeric = (c: string): boolean => isLetter(c) || isDigit(c);

export const isWhitespace = (c: string): boolean => /^\s$/.test(c);
