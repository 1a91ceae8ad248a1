import { basename, extname, join } from "node:path";

/**
 * Derive `{outputFolder}/{name-without-extension}.{suffix}` for an input file
 *
 * Without a suffix override the input's own extension is reused as-is
 * (`photo.PNG` stays `photo.PNG`). A file with no extension keeps its bare name.
 */
export function deriveOutputPath(
  inputPath: string,
  outputFolder: string,
  suffix: string | null,
): string {
  const filename = basename(inputPath);
  const extension = extname(filename);
  const imgname = extension ? filename.slice(0, -extension.length) : filename;
  const outsuffix = suffix ?? extension.slice(1);

  return join(outputFolder, outsuffix ? `${imgname}.${outsuffix}` : imgname);
}
