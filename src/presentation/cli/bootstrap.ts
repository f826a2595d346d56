import { Container } from 'inversify';
import { loadEnv } from '../../config/env';
import { createContainer, TYPES } from '../../config/inversify.config';
import { SqliteDatabase } from '../../infrastructure/database/SqliteDatabase';
import { Logger, LogLevel } from '../../shared/logger/Logger';

/** Env → logger level → container. Throws on invalid environment. */
export function bootstrap(): Container {
    const env = loadEnv();
    Logger.getInstance().setLogLevel(LogLevel[env.LOG_LEVEL]);
    return createContainer(env);
}

export function closeDatabase(container: Container): void {
    if (!container.isBound(TYPES.Database)) return;
    container.get<SqliteDatabase>(TYPES.Database).close();
}
