/**
 * Accept the single-dash `-help` spelling alongside -h and --help
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map((arg) => (arg === "-help" ? "--help" : arg));
}
