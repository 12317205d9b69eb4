type CharTest = (code: number) => boolean;

const isDigit: CharTest = code => code >= 48 && code <= 57;
const isLetter: CharTest = code => (code >= 65 && code <= 90) || (code >= 97 && code <= 122);
const isWordChar: CharTest = code => isDigit(code) || isLetter(code) || code === 95;
const isWordOrDash: CharTest = code => isWordChar(code) || code === 45;
const isNotSlash: CharTest = code => code !== 47;

// Requirements that are checked character by character instead of through RegExp.
const CHARACTER_CLASS_SHORTCUTS = new Map<string, CharTest>([
  ['\\d+', isDigit],
  ['\\d{1,}', isDigit],
  ['[0-9]+', isDigit],
  ['[0-9]{1,}', isDigit],
  ['[a-zA-Z]+', isLetter],
  ['[A-Za-z]+', isLetter],
  ['\\w+', isWordChar],
  ['\\w{1,}', isWordChar],
  ['[A-Za-z0-9_\\-]+', isWordOrDash],
  ['[A-Za-z0-9_-]+', isWordOrDash],
  ['[^/]+', isNotSlash],
]);

function everyChar(test: CharTest): (value: string) => boolean {
  return value => {
    if (value === '') {
      return false;
    }

    for (let index = 0; index < value.length; index++) {
      if (!test(value.charCodeAt(index))) {
        return false;
      }
    }

    return true;
  };
}

/**
 * Builds a test the whole placeholder value must pass. Throws `SyntaxError` for an invalid source.
 */
export function buildPatternTester(source: string, flags = ''): (value: string) => boolean {
  const shortcut = flags === '' ? CHARACTER_CLASS_SHORTCUTS.get(source) : undefined;

  if (shortcut !== undefined) {
    return everyChar(shortcut);
  }

  const anchored = new RegExp(`^(?:${source})$`, flags.replace(/[gy]/g, ''));

  return value => anchored.test(value);
}
