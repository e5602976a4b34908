import multer from 'multer';
import { loadConfig } from './index';

const ACCEPTED_MIME_TYPES = new Set([
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/gif',
  'image/tiff',
  'image/bmp'
]);

/**
 * In-memory upload handler; files are persisted by the task supervisor
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: loadConfig().maxUploadBytes,
    files: 1
  },
  fileFilter: (req, file, cb) => {
    if (ACCEPTED_MIME_TYPES.has(file.mimetype) || file.mimetype === 'application/octet-stream') {
      cb(null, true);
    } else {
      cb(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
    }
  }
});
