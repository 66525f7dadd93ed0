import { minimatch } from "minimatch";

export type FileStatus = "added" | "modified" | "deleted" | "renamed";

export interface FileDiff {
  path: string;
  status: FileStatus;
  hunks: string;
  /** New-file line numbers shown in the diff (added and context lines). */
  lines: number[];
}

const HUNK_HEADER = /^@@ -\d+(?:,\d+)? \+(\d+)(?:,\d+)? @@/;

function detectStatus(header: string): FileStatus {
  if (/^deleted file mode/m.test(header)) return "deleted";
  if (/^new file mode/m.test(header)) return "added";
  if (/^rename from /m.test(header)) return "renamed";
  return "modified";
}

function detectPath(header: string, status: FileStatus): string | null {
  const side = status === "deleted" ? /^--- a\/(.+)$/m : /^\+\+\+ b\/(.+)$/m;
  const marker = header.match(side);
  if (marker) return marker[1];

  const pathMatch = header.match(/^a\/(.+?)\s+b\/(.+)$/m);
  if (!pathMatch) return null;
  return status === "deleted" ? pathMatch[1] : pathMatch[2];
}

function collectLines(hunks: string): number[] {
  const lines: number[] = [];
  let current = 0;

  for (const line of hunks.split("\n")) {
    const header = HUNK_HEADER.exec(line);
    if (header) {
      current = parseInt(header[1], 10);
      continue;
    }
    // Blank context lines lose their leading space in some diff producers.
    if (line.startsWith("+") || line.startsWith(" ") || line === "") {
      lines.push(current);
      current++;
    }
    // "-" lines and "\ No newline at end of file" don't exist on the new side
  }

  return lines;
}

export function parseDiff(rawDiff: string): FileDiff[] {
  const files: FileDiff[] = [];
  const fileSections = rawDiff.split(/^diff --git /m).filter(Boolean);

  for (const section of fileSections) {
    // Skip binary files
    if (/^Binary files /m.test(section)) continue;

    // Extract everything from the first @@ hunk header onwards
    const hunkStart = section.search(/^@@/m);
    if (hunkStart === -1) continue;

    const header = section.slice(0, hunkStart);
    const status = detectStatus(header);
    const path = detectPath(header, status);
    if (!path) continue;

    const hunks = section.slice(hunkStart).replace(/\n+$/, "");
    files.push({ path, status, hunks, lines: collectLines(hunks) });
  }

  return files;
}

export function isExcluded(path: string, excludePatterns: string[]): boolean {
  return excludePatterns.some((pattern) =>
    minimatch(path, pattern, { dot: true, matchBase: true })
  );
}

export function filterFiles(
  files: FileDiff[],
  excludePatterns: string[],
  maxFiles: number
): FileDiff[] {
  const filtered = files.filter(
    (file) => file.status !== "deleted" && !isExcluded(file.path, excludePatterns)
  );

  return filtered.slice(0, maxFiles);
}

export function chunkDiffs(
  files: FileDiff[],
  maxCharsPerChunk: number = 30_000
): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const file of files) {
    const fileBlock = `### ${file.path}\n${file.hunks}\n\n`;
    if (current.length + fileBlock.length > maxCharsPerChunk && current) {
      chunks.push(current);
      current = "";
    }
    current += fileBlock;
  }

  if (current) {
    chunks.push(current);
  }

  return chunks;
}
