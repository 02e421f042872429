import multer from 'multer';
import { appConfig } from '../../connections/config/app.config';
import { InvalidInputError } from '../../utils/errors';
import { IMAGE_MIME_TYPES } from '../upload/storage.service';

// Files stay in memory until MediaStorage persists them
export const productUpload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: appConfig.maxFileSize,
    files: 1,
  },
  fileFilter: (_req, file, cb) => {
    if (IMAGE_MIME_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new InvalidInputError(`File type ${file.mimetype} is not supported`, { allowed: IMAGE_MIME_TYPES }));
    }
  },
});

export const productImageMiddleware = productUpload.single('image');
