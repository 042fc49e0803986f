export class AppError extends Error {
  code: string;
  status: number;

  constructor(code: string, status: number, message: string) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

export function notFoundError(): AppError {
  return new AppError("NOT_FOUND", 404, "File not found");
}

export function noFilesError(): AppError {
  return new AppError("NO_FILES", 400, "No files were uploaded");
}

export function tooManyFilesError(max: number): AppError {
  return new AppError("TOO_MANY_FILES", 400, `Maximum ${max} files allowed`);
}

export function fileTooLargeError(maxBytes: number): AppError {
  return new AppError(
    "FILE_TOO_LARGE",
    400,
    `File too large. Maximum size is ${Math.floor(maxBytes / 1024 / 1024)} MB`,
  );
}

export function invalidMultipartError(msg: string): AppError {
  return new AppError("INVALID_MULTIPART", 400, msg);
}

export function notPreviewableError(): AppError {
  return new AppError("NOT_PREVIEWABLE", 400, "File cannot be previewed as text");
}

export function readError(): AppError {
  return new AppError("READ_ERROR", 500, "Failed to read file");
}

export function unauthorizedError(msg: string): AppError {
  return new AppError("UNAUTHORIZED", 401, msg);
}
