export type ElementPath = string;

export function splitPath(path: ElementPath): string[] {
  return path
    .split("/")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function joinPath(segments: ReadonlyArray<string>): ElementPath {
  return segments.join("/");
}
