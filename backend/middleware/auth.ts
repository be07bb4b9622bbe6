import type { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config/app';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';
import { ApplicationError } from './errorHandler';

/**
 * 从 Authorization 头（Bearer）或 auth_token Cookie 中取出令牌
 */
function extractToken(req: Request): string | undefined {
    const authHeader = req.headers.authorization;
    if (authHeader && authHeader.startsWith('Bearer ')) {
        return authHeader.split(' ')[1];
    }

    const cookieHeader = req.headers.cookie;
    if (!cookieHeader) {
        return undefined;
    }

    for (const part of cookieHeader.split(';')) {
        const [name, ...value] = part.trim().split('=');
        if (name === 'auth_token') {
            try {
                return decodeURIComponent(value.join('='));
            } catch (error) {
                // 无法解码的 Cookie 按未携带令牌处理
                logger.warn('无法解析的 auth_token Cookie', { error });
                return undefined;
            }
        }
    }

    return undefined;
}

/**
 * 验证JWT令牌，并把 sub 声明作为调用方身份附加到请求对象。
 * 没有令牌或令牌无效时不阻止请求，只是不附加身份。
 */
export function authenticateToken(req: Request, res: Response, next: NextFunction): void {
    const token = extractToken(req);

    if (!token) {
        return next();
    }

    jwt.verify(token, config.jwt.secret, (err, decoded) => {
        if (err) {
            logger.warn('无效的令牌', { error: err.message });
            return next();
        }

        if (decoded && typeof decoded !== 'string' && typeof decoded.sub === 'string' && decoded.sub !== '') {
            req.identity = decoded.sub;
        }

        next();
    });
}

/**
 * 要求用户必须登录
 */
export function requireAuth(req: Request, res: Response, next: NextFunction): void {
    if (!req.identity) {
        res.status(401).json(
            createErrorResponse(
                ErrorCodes.UNAUTHORIZED,
                '需要登录才能访问此资源'
            )
        );
        return;
    }

    next();
}

/**
 * 取出当前调用方身份，供 requireAuth 之后的处理器使用
 */
export function currentIdentity(req: Request): string {
    if (!req.identity) {
        throw new ApplicationError(ErrorCodes.UNAUTHORIZED, '需要登录才能访问此资源', 401);
    }
    return req.identity;
}
