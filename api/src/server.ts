import { config, logger } from '../../mdmerge/src';
import { createApp } from './app';
import { createSessionRegistry } from './sessionRegistry';

const registry = createSessionRegistry();
const app = createApp({ registry });

process.on('uncaughtException', (err) => {
    logger.error('uncaughtException', { error: String(err.stack || err) });
});
process.on('unhandledRejection', (reason) => {
    logger.error('unhandledRejection', { error: String(reason instanceof Error ? reason.stack : reason) });
});

function start() {
    registry.startSweeper();
    const server = app.listen(config.PORT, () => {
        logger.info(`API listening on http://localhost:${config.PORT}`);
    });

    const shutdown = (signal: string) => {
        logger.info(`${signal} received, shutting down`);
        registry.stop();
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start();
