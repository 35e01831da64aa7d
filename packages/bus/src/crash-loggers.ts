export type FatalLog = (message: string, ...details: unknown[]) => void;

/** Log, rather than die on, errors nothing else caught. Called once from each process entry. */
export function installCrashLoggers(log: FatalLog = console.error): void {
    process.on('uncaughtException', (err) => {
        log('[FATAL] Uncaught Exception:', err);
    });

    process.on('unhandledRejection', (reason, promise) => {
        log('[FATAL] Unhandled Rejection at:', promise, 'reason:', reason);
    });
}
