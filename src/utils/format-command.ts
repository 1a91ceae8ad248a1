const SAFE_TOKEN = /^[\w@%+=:,./-]+$/;

/**
 * Render argv tokens as a copy-pasteable shell line (used for dry runs and debug output)
 */
export function formatCommand(argv: readonly string[]): string {
  return argv
    .map((token) => {
      if (token === "") return "''";
      if (SAFE_TOKEN.test(token)) return token;
      return `'${token.replace(/'/g, `'\\''`)}'`;
    })
    .join(" ");
}
