const MAX_SUGGESTIONS = 5;

/**
 * Given [ A, B, C ] return ' Did you mean A, B, or C?'.
 */
export function didYouMean(suggestions: ReadonlyArray<string>): string {
  const selected = suggestions.slice(0, MAX_SUGGESTIONS);
  const quoted = selected.map((x) => `"${x}"`);

  let message = ' Did you mean ';
  switch (quoted.length) {
    case 0:
      return '';
    case 1:
      return message + quoted[0] + '?';
    case 2:
      return message + quoted[0] + ' or ' + quoted[1] + '?';
  }

  const lastItem = quoted.pop();
  message += quoted.join(', ') + ', or ' + String(lastItem) + '?';
  return message;
}
