// ANSI color codes
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  dim: "\x1b[2m",
} as const;

export function red(text: string): string {
  return `${colors.red}${text}${colors.reset}`;
}

export function green(text: string): string {
  return `${colors.green}${text}${colors.reset}`;
}

export function dim(text: string): string {
  return `${colors.dim}${text}${colors.reset}`;
}

export function success(message: string): void {
  console.log(green(`✓ ${message}`));
}

export function error(message: string): void {
  console.error(red(`✗ ${message}`));
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
