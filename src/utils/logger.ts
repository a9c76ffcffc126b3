import pino from 'pino';

const logger = pino({
  name: 'quillbox',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
