/**
 * Script list parsing
 * The remote listing has one script per line; the name is the first field
 */

// Plain file names only: no path separators, no leading dot
const SCRIPT_NAME_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export interface ScriptList {
  scripts: string[];
  invalid: string[];
}

export function parseScriptList(content: string): ScriptList {
  const scripts: string[] = [];
  const invalid: string[] = [];
  const seen = new Set<string>();

  for (const line of content.split(/\r?\n/)) {
    const [name] = line.trim().split(/\s+/);
    if (!name) continue;

    if (!SCRIPT_NAME_PATTERN.test(name)) {
      invalid.push(name);
      continue;
    }

    if (seen.has(name)) continue;
    seen.add(name);
    scripts.push(name);
  }

  return { scripts, invalid };
}

/**
 * Fill the `{script}` placeholder(s) of a download URL template
 */
export function buildDownloadUrl(template: string, script: string): string {
  return template.replaceAll("{script}", encodeURIComponent(script));
}
