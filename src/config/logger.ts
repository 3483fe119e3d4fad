import winston from 'winston';

const env = process.env.NODE_ENV || 'development';

const developmentFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, service: _service, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${extra}${trace}`;
  })
);

const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (env === 'development' ? 'debug' : 'info'),
  format: env === 'production' ? productionFormat : developmentFormat,
  defaultMeta: { service: 'hospital-api' },
  transports: [new winston.transports.Console()],
  silent: env === 'test'
});

export default logger;
