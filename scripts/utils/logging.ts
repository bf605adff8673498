// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  bold: '\x1b[1m',
};

// Console helpers for the CLI scripts. Library code logs through @tube-to-pod/logging instead.
export function logSuccess(message: string, ...args: unknown[]): void {
  console.log(`${colors.green}✅ ${message}${colors.reset}`, ...args);
}

export function logError(message: string, ...args: unknown[]): void {
  console.error(`${colors.red}❌ ${message}${colors.reset}`, ...args);
}

export function logWarning(message: string, ...args: unknown[]): void {
  console.warn(`${colors.yellow}⚠️  ${message}${colors.reset}`, ...args);
}

export function logInfo(message: string, ...args: unknown[]): void {
  console.log(`${colors.blue}ℹ️  ${message}${colors.reset}`, ...args);
}

export function logDebug(message: string, ...args: unknown[]): void {
  console.log(`${colors.gray}🐛 ${message}${colors.reset}`, ...args);
}

export function logHeader(message: string): void {
  const separator = '='.repeat(Math.max(50, message.length + 4));
  console.log(`\n${colors.bold}${colors.cyan}${separator}`);
  console.log(`  ${message}`);
  console.log(`${separator}${colors.reset}\n`);
}
