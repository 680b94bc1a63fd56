import { format } from 'util';
import { AsyncLocalStorage } from 'async_hooks';
import { logger, LogContext } from './logger.js';
import { extractErrorMessage } from './utils/errors.js';
import { LogEvent } from './types/index.js';

export type { LogContext };
export const logContextStore = new AsyncLocalStorage<LogContext>();

type InterceptLevel = 'info' | 'warn' | 'error' | 'debug';

/**
 * Routes `console.*` through pino, merging the active log context.
 * Lines logged inside a context that sets `shouldPublishLog` are also
 * emitted as LOG pipeline events.
 */
export function formatLoggers(
    store: { getStore: () => LogContext | undefined; } = logContextStore,
    publishLogEvent?: (event: LogEvent) => Promise<void>
) {
    const handleIntercept = (level: InterceptLevel, args: unknown[]) => {
        const context = store.getStore();

        const first = args[ 0 ];
        const hasObject = typeof first === 'object' && first !== null && !(first instanceof Error);
        const metadata: Record<string, unknown> = hasObject ? { ...first } : {};
        const messageArgs = hasObject ? args.slice(1) : args;
        const message = format(...messageArgs);

        const { shouldPublishLog, ...cleanContext } = context ?? {};

        logger[ level ]({ ...cleanContext, ...metadata }, message);

        if (shouldPublishLog === true && context?.projectId && publishLogEvent) {
            let refinedMessage = message;
            const errorObj = metadata.error ?? metadata.err ?? args.find(a => a instanceof Error);
            if (level === 'error' && errorObj) {
                refinedMessage = extractErrorMessage(errorObj);
            }

            publishLogEvent({
                type: "LOG",
                projectId: context.projectId,
                commandId: context.commandId,
                timestamp: new Date().toISOString(),
                payload: {
                    level,
                    message: refinedMessage,
                    stageId: context.stageId,
                    workerId: context.workerId,
                },
            }).catch((err: unknown) => {
                logger.error({ err }, "Failed to publish log to pipeline");
            });
        }
    };

    console.log = (...args: unknown[]) => handleIntercept('info', args);
    console.info = (...args: unknown[]) => handleIntercept('info', args);
    console.warn = (...args: unknown[]) => handleIntercept('warn', args);
    console.error = (...args: unknown[]) => handleIntercept('error', args);
    console.debug = (...args: unknown[]) => handleIntercept('debug', args);
}
