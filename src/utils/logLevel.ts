import { log } from 'crawlee';

export type LogLevelValue = ReturnType<typeof log.getLevel>;

/** Maps a CRAWLEE_LOG_LEVEL name to Crawlee's level; unknown or empty → INFO. */
export function resolveLogLevel(name: string | undefined): LogLevelValue {
    switch (name?.trim().toUpperCase()) {
        case 'OFF':
            return log.LEVELS.OFF;
        case 'ERROR':
            return log.LEVELS.ERROR;
        case 'SOFT_FAIL':
            return log.LEVELS.SOFT_FAIL;
        case 'WARNING':
            return log.LEVELS.WARNING;
        case 'DEBUG':
            return log.LEVELS.DEBUG;
        case 'PERF':
            return log.LEVELS.PERF;
        default:
            return log.LEVELS.INFO;
    }
}
