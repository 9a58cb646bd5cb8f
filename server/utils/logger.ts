import winston from 'winston';

const isProduction = process.env.NODE_ENV === 'production';

export const logger = winston.createLogger({
    level: isProduction ? 'info' : 'debug',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json() // JSON format for structured logging
    ),
    defaultMeta: { service: 'restaurant-list' },
    transports: [
        new winston.transports.Console({
            // Keep stdout for the list output itself
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
            format: isProduction
                ? undefined  // Use default JSON in prod
                : winston.format.combine(
                    winston.format.colorize(), // Colorize for dev
                    winston.format.simple()    // Simple text for dev
                ),
        }),
    ],
});

export type LogContext = Record<string, unknown>;

export const setLogLevel = (level: string) => {
    logger.level = level;
};

// Helper for consistency
export const log = (message: string, context?: LogContext) => {
    logger.info(message, context);
};

export const logWarn = (message: string, context?: LogContext) => {
    logger.warn(message, context);
};

export const logError = (message: string, error?: unknown, context?: LogContext) => {
    logger.error(message, {
        ...context,
        error: error instanceof Error ? error.message : error,
        stack: error instanceof Error ? error.stack : undefined
    });
};
