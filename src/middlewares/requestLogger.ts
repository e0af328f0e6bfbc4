import { Request, Response } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

const stream: StreamOptions = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

// Uploaded workbook, filled in by multer before the response is logged
morgan.token<Request, Response>('upload', (req) =>
  req.file ? `${req.file.originalname} (${(req.file.size / 1024).toFixed(1)} KB)` : '-'
);

const DEV_FORMAT = ':method :url :status :response-time ms upload=:upload';
const PRODUCTION_FORMAT = ':remote-addr ":method :url HTTP/:http-version" :status :res[content-length] :response-time ms upload=:upload';

export const requestLogger = morgan(env.NODE_ENV === 'production' ? PRODUCTION_FORMAT : DEV_FORMAT, {
  stream,
  skip: () => env.NODE_ENV === 'test',
});

export default requestLogger;
