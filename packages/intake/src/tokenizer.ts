/**
 * Drop Payload Tokenizer
 * 
 * Splits a pasted or dropped path list into individual paths.
 * 
 * Accepted shapes:
 *   {/a/my movie.mp4} /a/en.srt          (Tk style)
 *   '/a/my movie.mp4' "/a/vi.srt"        (terminal paste)
 *   /a/my\ movie.mp4                     (escaped spaces)
 */

type TokenizerState =
  | { kind: 'between' }
  | { kind: 'inToken' }
  | { kind: 'inQuoted'; closer: string };

const QUOTE_CLOSERS: Record<string, string> = {
  '{': '}',
  "'": "'",
  '"': '"',
};

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

export function tokenizeDropPayload(payload: string): string[] {
  const tokens: string[] = [];
  let state: TokenizerState = { kind: 'between' };
  let current = '';

  const flush = (): void => {
    if (current.length > 0) {
      tokens.push(current);
    }
    current = '';
  };

  const chars = Array.from(payload);

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? '';

    switch (state.kind) {
      case 'between': {
        if (isWhitespace(ch)) break;
        const closer = QUOTE_CLOSERS[ch];
        if (closer) {
          state = { kind: 'inQuoted', closer };
        } else {
          state = { kind: 'inToken' };
          i--; // reprocess as the first character of the token
        }
        break;
      }

      case 'inToken': {
        const next = chars[i + 1];
        if (ch === '\\' && next !== undefined && isWhitespace(next)) {
          current += next;
          i++;
        } else if (isWhitespace(ch)) {
          flush();
          state = { kind: 'between' };
        } else {
          current += ch;
        }
        break;
      }

      case 'inQuoted': {
        if (ch === state.closer) {
          flush();
          state = { kind: 'between' };
        } else {
          current += ch;
        }
        break;
      }
    }
  }

  flush();
  return tokens;
}
