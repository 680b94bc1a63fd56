import pino from 'pino';
import os from 'os';

export interface LogContext {
    commandId?: string;
    projectId?: string;
    stageId?: string;
    workerId: string;
    correlationId: string;
    shouldPublishLog?: boolean;
}

const isDev = process.env.NODE_ENV !== 'production';

export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    mixin() {
        return { worker_id: `${os.hostname()}-${process.pid}`.toLowerCase() };
    },
    formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
    },
    base: undefined,
    timestamp: () => `,"timestamp_iso":"${new Date().toISOString()}"`,
    transport: isDev && process.env.NODE_ENV !== 'test' ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard' }
    } : undefined,
});
