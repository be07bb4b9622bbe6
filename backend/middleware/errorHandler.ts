import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import type { ErrorCode } from '../utils/apiResponse';
import { logger } from '../utils/logger';
import { TreeErrorKind } from '../utils/result';
import type { Result, TreeError } from '../utils/result';

export interface AppError extends Error {
    statusCode?: number;
    code?: string;
    details?: unknown;
    isOperational?: boolean;
}

/**
 * 自定义错误类，用于应用程序中抛出操作性错误
 */
export class ApplicationError extends Error implements AppError {
    statusCode: number;
    code: string;
    details?: unknown;
    isOperational: boolean;

    constructor(code: string, message: string, statusCode: number = 400, details?: unknown) {
        super(message);
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
        this.isOperational = true; // 这是一个可控制的业务错误

        // 设置原型链，以便错误实例正确地被instanceof检测
        Object.setPrototypeOf(this, ApplicationError.prototype);
    }
}

// 核心错误类型 → HTTP 状态码与错误代码
const TREE_ERROR_MAPPING: Record<TreeErrorKind, { statusCode: number; code: ErrorCode }> = {
    [TreeErrorKind.VALIDATION]: { statusCode: 400, code: ErrorCodes.VALIDATION_ERROR },
    [TreeErrorKind.NOT_FOUND]: { statusCode: 404, code: ErrorCodes.NOT_FOUND },
    [TreeErrorKind.PERMISSION_DENIED]: { statusCode: 403, code: ErrorCodes.FORBIDDEN },
    [TreeErrorKind.DEPTH_LIMIT_EXCEEDED]: { statusCode: 422, code: ErrorCodes.RESUME_DEPTH_LIMIT },
    [TreeErrorKind.NOT_PUBLISHED]: { statusCode: 409, code: ErrorCodes.RESUME_NOT_PUBLISHED },
    [TreeErrorKind.STORAGE_FAILURE]: { statusCode: 500, code: ErrorCodes.STORAGE_FAILURE }
};

export function toApplicationError(error: TreeError): ApplicationError {
    const { statusCode, code } = TREE_ERROR_MAPPING[error.kind];
    return new ApplicationError(code, error.message, statusCode, error.details);
}

/**
 * 取出成功结果的值；失败时抛出对应的 ApplicationError，交给全局错误处理
 */
export function unwrapResult<T>(result: Result<T>): T {
    if (!result.ok) {
        throw toApplicationError(result.error);
    }
    return result.value;
}

/**
 * 捕获异步路由处理器中的错误
 */
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
    (req: Request, res: Response, next: NextFunction): void => {
        fn(req, res, next).catch(next);
    };

/**
 * 处理404错误（未找到路由）
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
    const error = new ApplicationError(
        ErrorCodes.NOT_FOUND,
        `未找到路径: ${req.originalUrl}`,
        404
    );
    next(error);
};

/**
 * 全局错误处理中间件
 */
export const errorHandler = (
    err: AppError,
    req: Request,
    res: Response,
    next: NextFunction // eslint-disable-line @typescript-eslint/no-unused-vars
): void => {
    // 设置默认状态码和错误代码
    const statusCode = err.statusCode || 500;
    const errorCode = err.code || ErrorCodes.SERVER_ERROR;

    // 记录错误
    if (statusCode >= 500) {
        logger.error('服务器错误', {
            path: req.path,
            method: req.method,
            error: err.message,
            stack: err.stack
        });
    } else {
        logger.warn('客户端错误', {
            path: req.path,
            method: req.method,
            error: err.message,
            code: errorCode,
            details: err.details
        });
    }

    // 发送适当的响应
    res.status(statusCode).json(
        createErrorResponse(
            errorCode,
            err.message,
            process.env.NODE_ENV === 'development' ? err.details || err.stack : err.details
        )
    );
};

/**
 * 未捕获异常处理
 */
export const setupUncaughtExceptionHandling = (): void => {
    // 处理未捕获的异常
    process.on('uncaughtException', (error: Error) => {
        logger.error('未捕获的异常', { error: error.message, stack: error.stack });

        // 给应用程序一些时间来完成待处理的请求并关闭资源
        setTimeout(() => {
            process.exit(1);
        }, 1000);
    });

    // 处理未处理的Promise拒绝，转换为未捕获的异常
    process.on('unhandledRejection', (reason: unknown) => {
        logger.error('未处理的Promise拒绝', { reason });
        throw reason;
    });
};
