export type FileCategory =
  | "image"
  | "video"
  | "audio"
  | "text"
  | "code"
  | "pdf"
  | "archive"
  | "document"
  | "unknown";

export interface Classification {
  category: FileCategory;
  previewable: boolean;
}

const EXTENSIONS: ReadonlyArray<[FileCategory, readonly string[]]> = [
  ["image", ["jpg", "jpeg", "png", "gif", "webp", "svg", "bmp", "ico"]],
  ["video", ["mp4", "webm", "mov", "avi", "mkv", "m4v"]],
  ["audio", ["mp3", "wav", "m4a", "aac", "flac", "ogg"]],
  ["text", ["txt", "md", "json", "xml", "csv", "log", "yml", "yaml", "toml", "ini"]],
  ["code", ["js", "ts", "html", "css", "rs", "py", "java", "c", "cpp", "h", "hpp", "go", "rb", "php", "sh", "bash"]],
  ["pdf", ["pdf"]],
  ["archive", ["zip", "rar", "7z", "tar", "gz", "bz2"]],
  ["document", ["doc", "docx", "xls", "xlsx", "ppt", "pptx"]],
];

const NOT_PREVIEWABLE: ReadonlySet<FileCategory> = new Set(["archive", "document", "unknown"]);

const byExtension = new Map<string, FileCategory>();
for (const [category, exts] of EXTENSIONS) {
  for (const ext of exts) {
    byExtension.set(ext, category);
  }
}

/** Lowercased text after the last dot, or "" when the name has none. */
export function extensionOf(name: string): string {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? "" : name.slice(dot + 1).toLowerCase();
}

export function classify(displayName: string): Classification {
  const category = byExtension.get(extensionOf(displayName)) ?? "unknown";
  return { category, previewable: !NOT_PREVIEWABLE.has(category) };
}

/** Categories whose content the preview reader returns as text. */
export function isTextCategory(category: FileCategory): boolean {
  return category === "text" || category === "code";
}
