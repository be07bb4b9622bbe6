import fs from 'fs';
import path from 'path';
import type { Request, Response } from 'express';
import { config } from '../config/app';
import type { LogLevel } from '../config/app';

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

interface RequestInfo {
    method: string;
    path: string;
    status: number;
    responseTime: number;
    identity?: string;
    userAgent?: string;
    ip?: string;
}

export interface LoggerOptions {
    level: LogLevel;
    directory: string;
    toFile: boolean;
}

// Error 默认序列化为 {}，这里展开成可读字段
function serializeMeta(_key: string, value: unknown): unknown {
    if (value instanceof Error) {
        return { name: value.name, message: value.message, stack: value.stack };
    }
    return value;
}

export class Logger {
    private readonly logFile: string;
    private readonly threshold: number;

    constructor(private readonly options: LoggerOptions) {
        this.logFile = path.join(options.directory, 'app.log');
        this.threshold = LEVEL_WEIGHT[options.level];

        // 确保日志目录存在
        if (options.toFile) {
            this.ensureLogDir();
        }
    }

    private ensureLogDir(): void {
        if (!fs.existsSync(this.options.directory)) {
            fs.mkdirSync(this.options.directory, { recursive: true });
        }
    }

    formatMessage(level: LogLevel, message: string, meta?: unknown): string {
        const timestamp = new Date().toISOString();
        let logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}`;

        if (meta !== undefined) {
            try {
                logMessage += ` ${JSON.stringify(meta, serializeMeta)}`;
            } catch (error) {
                logMessage += ` [Meta serialization failed: ${String(error)}]`;
            }
        }

        return logMessage;
    }

    private write(level: LogLevel, message: string, meta?: unknown): void {
        if (LEVEL_WEIGHT[level] < this.threshold) {
            return;
        }

        const formattedMessage = this.formatMessage(level, message, meta);
        console[level](formattedMessage);

        if (this.options.toFile) {
            fs.appendFileSync(this.logFile, formattedMessage + '\n');
        }
    }

    debug(message: string, meta?: unknown): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: unknown): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: unknown): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: unknown): void {
        this.write('error', message, meta);
    }

    // 用于记录API请求信息
    logRequest(req: Request, res: Response, responseTime: number): void {
        const logData: RequestInfo = {
            method: req.method,
            path: req.path,
            status: res.statusCode,
            responseTime,
            identity: req.identity,
            userAgent: req.headers['user-agent'],
            ip: req.ip
        };

        this.info(`HTTP ${req.method} ${req.path} ${res.statusCode}`, logData);
    }
}

// 导出单例
export const logger = new Logger(config.logging);
