export type UnicodeForm = "NFC" | "NFD" | "NFKC" | "NFKD";

const SINGLE_QUOTES = /[\u2018\u2019\u201A\u201B\u2032\u02BC]/g;
const DOUBLE_QUOTES = /[\u201C\u201D\u201E\u201F\u2033\u00AB\u00BB]/g;
const DASHES = /[\u2010\u2011\u2012\u2013\u2014\u2015\u2212]/g;
const ELLIPSIS = /\u2026/g;
// C0 controls other than whitespace, DEL, C1 controls, zero-width marks, soft hyphen.
const INVISIBLE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F\u200B-\u200D\u2060\uFEFF\u00AD]/g;
const WHITESPACE = /\s+/g;

export const normalizeText = (value: string, form: UnicodeForm = "NFKC"): string =>
  value
    .normalize(form)
    .replace(SINGLE_QUOTES, "'")
    .replace(DOUBLE_QUOTES, '"')
    .replace(DASHES, "-")
    .replace(ELLIPSIS, "...")
    .replace(INVISIBLE, "")
    .replace(WHITESPACE, " ")
    .trim();

export const toMatchKey = (value: string, form: UnicodeForm = "NFKC"): string =>
  normalizeText(value, form).toLowerCase();

export const tokenize = (key: string): string[] =>
  key.split(" ").filter((token) => token.length > 0);
