import path from 'path';
import dotenv from 'dotenv';

// 加载环境变量
dotenv.config();

export type StorageDriver = 'mongo' | 'memory';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevel {
    const level = LOG_LEVELS.find(candidate => candidate === value);
    return level ?? 'info';
}

// 仅接受正整数，其余情况回退到默认值
export function parsePositiveInt(value: string | undefined, fallback: number): number {
    if (value === undefined || !/^\d+$/.test(value.trim())) {
        return fallback;
    }
    const parsed = parseInt(value, 10);
    return parsed > 0 ? parsed : fallback;
}

function parseStorageDriver(value: string | undefined): StorageDriver {
    return value === 'memory' ? 'memory' : 'mongo';
}

const env = process.env.NODE_ENV || 'development';

// 应用配置
export const config = {
    // 服务器配置
    server: {
        port: parseInt(process.env.PORT || '4000', 10),
        host: process.env.HOST || '0.0.0.0',
        env,
        isProduction: env === 'production',
        isDevelopment: env === 'development',
        isTest: env === 'test',
    },

    // 存储配置：mongo 需要副本集以支持事务；memory 仅保存在进程内
    storage: {
        driver: parseStorageDriver(process.env.STORAGE_DRIVER),
    },

    // 数据库配置
    database: {
        uri: process.env.MONGODB_URI || 'mongodb://localhost:27017/resume-tree',
        options: {
            autoIndex: !(env === 'production'),
            serverSelectionTimeoutMS: 5000,
            socketTimeoutMS: 45000,
        },
    },

    // 简历树配置
    resumeTree: {
        // 有效深度为 0..maxDepth-1
        maxDepth: parsePositiveInt(process.env.RESUME_MAX_DEPTH, 5),
    },

    // JWT配置（仅用于从令牌中取出调用方身份）
    jwt: {
        secret: process.env.JWT_SECRET || 'your-secret-key-should-be-long-and-secure',
    },

    // API限流配置
    rateLimit: {
        windowMs: parseInt(process.env.RATE_LIMIT_WINDOW || '900000', 10), // 15分钟
        max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
    },

    // 日志配置
    logging: {
        directory: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
        level: parseLogLevel(process.env.LOG_LEVEL),
        toFile: process.env.LOG_TO_FILE !== 'false' && env !== 'test',
    },

    // CORS配置
    cors: {
        origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
        credentials: true,
    }
};

export default config;
