import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { config } from './config/app';
import { connectToDatabase, disconnectFromDatabase } from './config/database';
import { logger } from './utils/logger';
import { createErrorResponse, ErrorCodes } from './utils/apiResponse';
import { errorHandler, notFoundHandler, setupUncaughtExceptionHandling } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createServices, createUnitOfWork } from './services';
import type { Services } from './services';

// 导入路由
import { createResumeRoutes } from './routes/resumeRoutes';
import { createRoomRoutes } from './routes/roomRoutes';

/**
 * 创建Express应用。服务容器由调用方构造后传入
 */
export function createApp(services: Services): Express {
    const app = express();

    // 设置全局中间件
    app.use(cors(config.cors));
    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    // 请求日志
    if (config.server.isDevelopment) {
        app.use(morgan('dev'));
    }
    app.use(requestLogger);

    // 限制请求速率
    if (!config.server.isTest) {
        app.use(rateLimit({
            windowMs: config.rateLimit.windowMs,
            limit: config.rateLimit.max,
            standardHeaders: true,
            legacyHeaders: false,
            message: createErrorResponse(ErrorCodes.RATE_LIMIT_EXCEEDED, '请求频率过高，请稍后再试')
        }));
    }

    // 注册路由
    app.use('/api/resumes', createResumeRoutes(services));
    app.use('/api/rooms', createRoomRoutes(services));

    // 健康检查端点
    app.get('/api/health', (req, res) => {
        res.json({
            success: true,
            data: {
                status: 'OK',
                storage: config.storage.driver,
                timestamp: new Date(),
                uptime: process.uptime()
            }
        });
    });

    // 处理404错误
    app.use(notFoundHandler);

    // 全局错误处理
    app.use(errorHandler);

    return app;
}

// 启动服务器
export const startServer = async (): Promise<void> => {
    setupUncaughtExceptionHandling();

    try {
        if (config.storage.driver === 'mongo') {
            await connectToDatabase();
        } else {
            logger.warn('使用内存存储，数据不会持久化');
        }

        const services = createServices(createUnitOfWork(config.storage.driver), {
            maxDepth: config.resumeTree.maxDepth
        });
        const app = createApp(services);

        const PORT = config.server.port;
        const HOST = config.server.host;

        const server = app.listen(PORT, HOST, () => {
            logger.info('服务器已启动', {
                port: PORT,
                host: HOST,
                env: config.server.env,
                storage: config.storage.driver,
                nodeVersion: process.version
            });
        });

        process.on('SIGINT', () => {
            server.close(() => {
                const closing = config.storage.driver === 'mongo' ? disconnectFromDatabase() : Promise.resolve();
                closing
                    .then(() => process.exit(0))
                    .catch((error: unknown) => {
                        logger.error('关闭数据库连接失败', { error });
                        process.exit(1);
                    });
            });
        });
    } catch (error) {
        logger.error('服务器启动失败', { error });
        process.exit(1);
    }
};

// 如果这个文件是直接运行的（不是被导入的），则启动服务器
if (require.main === module) {
    void startServer();
}
