import mongoose from 'mongoose';
import { config } from './app';
import { logger } from '../utils/logger';

// 连接到MongoDB。事务要求目标实例是副本集
export const connectToDatabase = async (): Promise<typeof mongoose> => {
    logger.info('正在连接到MongoDB...');

    const connection = await mongoose.connect(config.database.uri, config.database.options);

    logger.info('成功连接到MongoDB', {
        host: connection.connection.host,
        port: connection.connection.port,
        name: connection.connection.name
    });

    setupConnectionListeners();

    return connection;
};

export const disconnectFromDatabase = async (): Promise<void> => {
    await mongoose.disconnect();
    logger.info('MongoDB连接已关闭');
};

// 设置连接事件监听器；断线重连由驱动负责
const setupConnectionListeners = (): void => {
    const db = mongoose.connection;

    db.on('error', (err: Error) => {
        logger.error('MongoDB连接错误', { error: err.message });
    });

    db.on('disconnected', () => {
        logger.warn('与MongoDB的连接已断开');
    });

    db.on('reconnected', () => {
        logger.info('已重新连接到MongoDB');
    });
};
