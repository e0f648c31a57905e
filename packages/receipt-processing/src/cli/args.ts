import { parseArgs } from "util";
import { extname } from "path";

export const SUPPORTED_EXTENSIONS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".pdf",
  ".tiff",
  ".tif",
];

const CONTENT_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".pdf": "application/pdf",
  ".tiff": "image/tiff",
  ".tif": "image/tiff",
};

export type CliArgs = {
  bucket?: string;
  key?: string;
  file?: string;
};

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      bucket: { type: "string", short: "b" },
      key: { type: "string", short: "k" },
      file: { type: "string", short: "f" },
    },
    strict: true,
  });

  return { bucket: values.bucket, key: values.key, file: values.file };
}

export function isSupportedFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

export function contentTypeFor(filePath: string): string | undefined {
  return CONTENT_TYPES[extname(filePath).toLowerCase()];
}

/**
 * Object key used when a local file is uploaded without an explicit `--key`.
 */
export function defaultUploadKey(fileName: string, now: Date = new Date()): string {
  return `uploads/${now.toISOString().slice(0, 10)}/${fileName}`;
}
