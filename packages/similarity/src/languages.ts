/**
 * Language tags accepted by the MOSS server
 */
export const SUPPORTED_LANGUAGES = [
  'c', 'cc', 'java', 'ml', 'pascal', 'ada', 'lisp', 'scheme', 'haskell',
  'fortran', 'ascii', 'vhdl', 'verilog', 'perl', 'matlab', 'python', 'mips',
  'prolog', 'spice', 'vb', 'csharp', 'modula2', 'a8086', 'javascript', 'plsql',
] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export function isSupportedLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some(language => language === value);
}
