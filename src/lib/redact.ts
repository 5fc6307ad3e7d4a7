/** Shows just enough of a token to tell two apart without leaking it. */
export function redactToken(value: string, visible = 4): string {
  if (!value) {
    return value;
  }
  if (value.length <= visible * 3) {
    return "[redacted]";
  }
  return `${value.slice(0, visible)}…${value.slice(-visible)} (${value.length} chars)`;
}
