import multer from "multer";
import path from "path";
import { mkdirSync, rmSync } from "fs";
import { v4 as uuidv4 } from "uuid";
import type { Config } from "../config/env.js";
import { ValidationError } from "../errors.js";
import { logger } from "../logger.js";

const IMAGE_EXTENSIONS: Record<string, string> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/webp": ".webp",
  "image/gif": ".gif",
};

export function createImageUpload(
  config: Pick<Config, "uploadDir" | "maxImageSizeBytes">,
): multer.Multer {
  mkdirSync(config.uploadDir, { recursive: true });

  return multer({
    storage: multer.diskStorage({
      destination: config.uploadDir,
      filename: (_req, file, cb) => {
        cb(null, `${uuidv4()}${IMAGE_EXTENSIONS[file.mimetype] ?? ""}`);
      },
    }),
    limits: {
      fileSize: config.maxImageSizeBytes,
      files: 1,
    },
    fileFilter: (_req, file, cb) => {
      if (Object.hasOwn(IMAGE_EXTENSIONS, file.mimetype)) {
        cb(null, true);
      } else {
        cb(
          new ValidationError([
            {
              path: "image",
              message: `unsupported type ${file.mimetype}; expected png, jpeg, webp or gif`,
            },
          ]),
        );
      }
    },
  });
}

/** Stored image paths are bare file names inside the upload directory. */
export function removeStoredImage(uploadDir: string, fileName: string): void {
  const target = path.join(uploadDir, path.basename(fileName));
  try {
    rmSync(target, { force: true });
  } catch (error) {
    logger.warn({ error, file: target }, "Could not remove stored image");
  }
}
