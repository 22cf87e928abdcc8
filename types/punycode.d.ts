// The npm `punycode` package is imported with a trailing slash so that Node resolves
// it instead of its deprecated built-in module of the same name. It ships no types.
declare module 'punycode/' {
  function toASCII(domain: string): string;
  function toUnicode(domain: string): string;
  function encode(input: string): string;
  function decode(input: string): string;
}
