import winston from 'winston';

// call logger.info('text', { text: 'test' })
export const logger = winston.createLogger({
    level: process.env.HARNESS_LOG_LEVEL ?? 'info',
    defaultMeta: { package: 'fixture' },
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.prettyPrint(),
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.prettyPrint(),
        }),
    ],
});
