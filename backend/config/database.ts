import mongoose from 'mongoose';
import { config } from './app';
import { logger } from '../utils/logger';

const RECONNECT_DELAY_MS = 5000;

// 连接配置选项
const options = {
    autoIndex: !config.server.isProduction,
    serverSelectionTimeoutMS: 5000,
    socketTimeoutMS: 45000,
};

let listenersAttached = false;
let shuttingDown = false;

// 连接到MongoDB
export const connectToDatabase = async (uri: string = config.database.uri): Promise<typeof mongoose> => {
    logger.info('正在连接到MongoDB...');

    const connection = await mongoose.connect(uri, options);

    logger.info('成功连接到MongoDB', {
        host: connection.connection.host,
        port: connection.connection.port,
        name: connection.connection.name
    });

    setupConnectionListeners(uri);
    return connection;
};

export const disconnectFromDatabase = async (): Promise<void> => {
    shuttingDown = true;
    await mongoose.connection.close();
    logger.info('MongoDB连接已关闭');
};

// 设置连接事件监听器
const setupConnectionListeners = (uri: string): void => {
    if (listenersAttached) {
        return;
    }
    listenersAttached = true;

    const db = mongoose.connection;

    db.on('error', (err: unknown) => {
        logger.error('MongoDB连接错误', err);
    });

    db.on('disconnected', () => {
        if (shuttingDown) {
            return;
        }
        logger.warn('与MongoDB的连接已断开，尝试重新连接...');
        setTimeout(() => {
            connectToDatabase(uri).catch((error: unknown) => {
                logger.error('重新连接MongoDB失败', error);
            });
        }, RECONNECT_DELAY_MS);
    });
};

export default { connectToDatabase, disconnectFromDatabase };
