import type { ReviewComment } from "../llm/types.js";
import type { FileDiff } from "./differ.js";

export interface PartitionedComments {
  /** Comments GitHub accepts as inline review comments. */
  inline: ReviewComment[];
  /** Comments pointing at a file or line outside the reviewed diff. */
  outOfDiff: ReviewComment[];
}

export function dedupeComments(comments: ReviewComment[]): ReviewComment[] {
  const seen = new Set<string>();
  return comments.filter((comment) => {
    const key = `${comment.path}\u0000${comment.line}\u0000${comment.body}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function partitionComments(
  comments: ReviewComment[],
  files: FileDiff[]
): PartitionedComments {
  const commentable = new Map(
    files.map((file) => [file.path, new Set(file.lines)])
  );

  const result: PartitionedComments = { inline: [], outOfDiff: [] };
  for (const comment of dedupeComments(comments)) {
    if (commentable.get(comment.path)?.has(comment.line)) {
      result.inline.push(comment);
    } else {
      result.outOfDiff.push(comment);
    }
  }
  return result;
}
