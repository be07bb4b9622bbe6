import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';

// 超过该时长的请求记为慢请求
const SLOW_REQUEST_MS = 1000;

/**
 * 请求日志记录中间件
 * 在响应结束时记录请求详情和处理时间
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    req.startTime = Date.now();

    res.on('finish', () => {
        const responseTime = Date.now() - (req.startTime || 0);

        logger.logRequest(req, res, responseTime);

        if (responseTime > SLOW_REQUEST_MS) {
            logger.warn(`慢请求: ${req.method} ${req.path}`, {
                responseTime: `${responseTime}ms`,
                method: req.method,
                path: req.path
            });
        }
    });

    next();
}
