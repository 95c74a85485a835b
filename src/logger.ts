import winston from 'winston';

// =================================================================
// LOGGER
// =================================================================
// One winston logger per component. JSON lines with a timestamp and
// the component name under `context`. LOG_LEVEL picks the level;
// everything is silent under NODE_ENV=test.
// =================================================================

export type Logger = winston.Logger;

const root = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
    ),
    transports: [new winston.transports.Console()],
});

export function createLogger(context: string): Logger {
    return root.child({ context });
}
