import { describe, expect, it } from 'vitest';
import { tokenizeDropPayload } from './tokenizer.js';

describe('tokenizeDropPayload', () => {
  it('splits bare paths on whitespace, including newlines', () => {
    expect(tokenizeDropPayload('/a/movie.mp4 /a/en.srt\n/a/vi.srt\r\n')).toEqual([
      '/a/movie.mp4',
      '/a/en.srt',
      '/a/vi.srt',
    ]);
  });

  it('keeps braced tokens whole', () => {
    expect(tokenizeDropPayload('{/a/my movie.mp4} /a/en.srt {/b/vi sub.srt}')).toEqual([
      '/a/my movie.mp4',
      '/a/en.srt',
      '/b/vi sub.srt',
    ]);
  });

  it('accepts single and double quoted paths', () => {
    expect(tokenizeDropPayload(`'/a/my movie.mp4' "/a/en sub.srt"`)).toEqual([
      '/a/my movie.mp4',
      '/a/en sub.srt',
    ]);
  });

  it('treats quotes inside a bare token as part of the path', () => {
    expect(tokenizeDropPayload("/a/it's.srt /a/b{c}.srt")).toEqual(["/a/it's.srt", '/a/b{c}.srt']);
  });

  it('unescapes backslash-escaped spaces and keeps Windows separators', () => {
    expect(tokenizeDropPayload(String.raw`/Users/me/My\ Movie.mp4 C:\Vids\en.srt`)).toEqual([
      '/Users/me/My Movie.mp4',
      String.raw`C:\Vids\en.srt`,
    ]);
  });

  it('drops empty tokens and keeps an unterminated quote', () => {
    expect(tokenizeDropPayload('  {} "" /a/x.srt {/a/unclosed y.srt')).toEqual([
      '/a/x.srt',
      '/a/unclosed y.srt',
    ]);
    expect(tokenizeDropPayload('')).toEqual([]);
  });
});
