// src/index.ts

import { createServer, Server } from 'http';
import { WebSocketServer } from 'ws';
import { createApp } from './app';
import { AppConfig, loadConfig, loadEnvFile } from './config';
import { buildServices } from './container';
import { CHAT_SOCKET_PATH, ChatController } from './controller/chat.controller';
import { ConfigurationError, errorMessage } from './errors';
import { createLogger } from './utils/logger';
import { waitForShutdown, withResource } from './utils/lifecycle';

const logger = createLogger('server');

function listen(server: Server, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, () => {
            server.off('error', reject);
            resolve();
        });
    });
}

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}

async function serve(config: Readonly<AppConfig>): Promise<void> {
    const services = buildServices(config);

    await withResource(
        async () => {
            await services.conversations.open();
            return services.conversations;
        },
        (conversations) => conversations.close(),
        async (conversations) => {
            const server = createServer(createApp(conversations));
            const wss = new WebSocketServer({ server, path: CHAT_SOCKET_PATH });
            new ChatController({
                logger: createLogger('chat'),
                orchestrator: services.orchestrator,
                conversations,
                streamManager: services.streamManager,
            }).attach(wss);

            await listen(server, config.port);
            logger.info('Server is listening', { port: config.port, websocketPath: CHAT_SOCKET_PATH });

            const signal = await waitForShutdown();
            logger.info('Shutting down', { signal });

            wss.clients.forEach((client) => client.close(1001, 'Server shutting down'));
            await new Promise<void>((resolve) => wss.close(() => resolve()));
            await closeServer(server);
        },
    );
}

async function main(): Promise<void> {
    loadEnvFile();

    let config: Readonly<AppConfig>;
    try {
        config = loadConfig();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            logger.error('Invalid configuration', { error: error.message, hint: error.hint, ...error.meta });
            process.exitCode = 1;
            return;
        }
        throw error;
    }

    await serve(config);
}

main().catch((error: unknown) => {
    logger.error('Server stopped with an error', { error: errorMessage(error) });
    process.exitCode = 1;
});
