/**
 * Extraction of the files named in a GH001 (file too large) push rejection
 */

const FILE_BEGIN = /^remote:\serror:\sFile\s/gm;
const FILE_END = /;\sthis\sexceeds\sGitHub's\sfile\ssize\slimit\sof\s100.00\sMB/g;

/**
 * List the oversized files reported in push output
 *
 * Each entry reads `name (size)`, e.g. `assets/video.mov (120.00 MB)`.
 * When the begin and end markers do not pair up the output is treated as
 * unparseable and no files are returned.
 */
export function getOversizedFiles(output: string): string[] {
  const begins = Array.from(output.matchAll(FILE_BEGIN));
  const ends = Array.from(output.matchAll(FILE_END));

  if (begins.length !== ends.length) {
    return [];
  }

  const files: string[] = [];
  begins.forEach((begin, i) => {
    const end = ends[i];
    if (end?.index === undefined || begin.index === undefined) return;
    const from = begin.index + begin[0].length;
    files.push(`${output.slice(from, end.index).replaceAll('is ', '(')})`);
  });

  return files;
}
