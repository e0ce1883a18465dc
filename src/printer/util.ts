const integerPattern = /^[+-]?\d+$/;

export function isInteger(value: string): boolean {
  return integerPattern.test(value);
}

export function formatBool(value: boolean): string {
  return value ? 'true' : 'false';
}

export function formatList(values: readonly string[]): string {
  return values.join(', ');
}

export function indentLines(text: string, indent: string): string {
  return text.split('\n').join('\n' + indent);
}
