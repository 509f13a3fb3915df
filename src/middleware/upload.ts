import multer from 'multer';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as path from 'path';
import * as fs from 'fs';

export const UPLOAD_FILE_PREFIX = 'lookup-upload-';

/** A request whose upload was refused; answered with 400 */
export class UploadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UploadError';
  }
}

/**
 * File filter to accept CSV and TXT files
 */
const fileFilter = (req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback): void => {
  const allowedMimeTypes = [
    'text/csv',
    'text/plain',
    'application/csv',
    'application/vnd.ms-excel', // Some systems report CSV as this
  ];

  const allowedExtensions = ['.csv', '.txt'];
  const ext = path.extname(file.originalname).toLowerCase();

  if (allowedMimeTypes.includes(file.mimetype) || allowedExtensions.includes(ext)) {
    cb(null, true);
  } else {
    cb(new UploadError('Only CSV and TXT files are allowed'));
  }
};

/**
 * Express middleware that stores the `datafile` field on disk under `storageDir`
 */
export function createUploadMiddleware(storageDir: string, maxFileSize = 256 * 1024 * 1024): RequestHandler {
  if (!fs.existsSync(storageDir)) {
    fs.mkdirSync(storageDir, { recursive: true });
  }

  const storage = multer.diskStorage({
    destination: (req, file, cb) => {
      cb(null, storageDir);
    },
    filename: (req, file, cb) => {
      const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1e9);
      const ext = path.extname(file.originalname).toLowerCase() || '.csv';
      cb(null, UPLOAD_FILE_PREFIX + uniqueSuffix + ext);
    },
  });

  const upload = multer({
    storage,
    fileFilter,
    limits: { fileSize: maxFileSize },
  }).single('datafile');

  return (req: Request, res: Response, next: NextFunction): void => {
    upload(req, res, (err) => {
      if (err instanceof multer.MulterError) {
        return next(new UploadError(err.message));
      }
      if (err) {
        return next(err);
      }
      if (!req.file) {
        return next(new UploadError('No file uploaded'));
      }
      next();
    });
  };
}
