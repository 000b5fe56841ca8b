import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import type { Request } from 'express';
import type { AppConfig } from '@/config/app.config';
import { ValidationError } from '@/utils/errors';

/** Sub-directory of the upload root holding product images. */
export const PRODUCT_IMAGE_DIR = 'product_images';

export const MAX_IMAGES_PER_REQUEST = 10;

export const MULTI_IMAGE_FIELD = 'images';

const ALLOWED_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/gif', 'image/jpg'];

const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const isAllowed =
    ALLOWED_TYPES.includes(file.mimetype) ||
    file.mimetype.startsWith('image/') ||
    /\.(jpg|jpeg|png|webp|gif)$/i.test(file.originalname);

  if (isAllowed) {
    cb(null, true);
  } else {
    cb(new ValidationError(`Invalid file type. Allowed types: ${ALLOWED_TYPES.join(', ')}`));
  }
};

export interface ImageUpload {
  single: ReturnType<multer.Multer['single']>;
  multiple: ReturnType<multer.Multer['array']>;
  /** Path stored on the image row for an uploaded file. */
  storedPath(file: Express.Multer.File): string;
}

export function createImageUpload(config: Pick<AppConfig, 'uploads'>): ImageUpload {
  const destination = path.join(config.uploads.path, PRODUCT_IMAGE_DIR);
  if (!fs.existsSync(destination)) {
    fs.mkdirSync(destination, { recursive: true });
  }

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, destination);
    },
    filename: (_req, file, cb) => {
      cb(null, `${uuidv4()}-${Date.now()}${path.extname(file.originalname).toLowerCase()}`);
    },
  });

  const upload = multer({
    storage,
    fileFilter,
    limits: { fileSize: config.uploads.maxFileSize },
  });

  return {
    single: upload.single('image'),
    multiple: upload.array(MULTI_IMAGE_FIELD, MAX_IMAGES_PER_REQUEST),
    storedPath: (file) => path.posix.join(PRODUCT_IMAGE_DIR, file.filename),
  };
}
