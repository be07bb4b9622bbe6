import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createErrorResponse, ErrorCodes } from '../utils/apiResponse';
import { logger } from '../utils/logger';

// 请求参数与请求体都只有文本字段
export interface ValidationRule {
    type: 'string';
    required?: boolean;
    min?: number;
    max?: number;
    pattern?: RegExp;
}

// 验证规则类型定义
export interface ValidationSchema {
    [key: string]: ValidationRule;
}

// 验证错误格式
interface ValidationErrors {
    [key: string]: string;
}

/**
 * 请求验证中间件
 * 验证请求的路径参数和请求体是否符合指定的Schema
 */
export function validateRequest(schema: {
    params?: ValidationSchema;
    body?: ValidationSchema;
}): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        // 收集所有验证错误
        const errors: ValidationErrors = {};

        if (schema.params) {
            Object.assign(errors, validate(req.params, schema.params));
        }

        if (schema.body) {
            Object.assign(errors, validate(req.body, schema.body));
        }

        if (Object.keys(errors).length > 0) {
            logger.warn('请求验证失败', {
                method: req.method,
                path: req.path,
                errors
            });

            res.status(400).json(
                createErrorResponse(
                    ErrorCodes.VALIDATION_ERROR,
                    '请求参数验证失败',
                    errors
                )
            );
            return;
        }

        next();
    };
}

export function toRecord(data: unknown): Record<string, unknown> {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        return {};
    }
    return Object.fromEntries(Object.entries(data));
}

/**
 * 验证数据是否符合指定的Schema，返回验证错误集合
 */
export function validate(data: unknown, schema: ValidationSchema): ValidationErrors {
    const errors: ValidationErrors = {};
    const record = toRecord(data);

    for (const [field, rules] of Object.entries(schema)) {
        const value = record[field];

        // 检查必填字段
        if (rules.required && (value === undefined || value === null || value === '')) {
            errors[field] = `${field} 字段是必填的`;
            continue;
        }

        // 如果字段不存在且不是必填的，跳过后续验证
        if (value === undefined || value === null) {
            continue;
        }

        if (typeof value !== 'string') {
            errors[field] = `${field} 字段类型应为 ${rules.type}`;
            continue;
        }

        // 字符串长度，最小长度不计首尾空白
        if (rules.min !== undefined && value.trim().length < rules.min) {
            errors[field] = `${field} 长度不能小于 ${rules.min} 个字符`;
            continue;
        }

        if (rules.max !== undefined && value.length > rules.max) {
            errors[field] = `${field} 长度不能大于 ${rules.max} 个字符`;
            continue;
        }

        if (rules.pattern && !rules.pattern.test(value)) {
            errors[field] = `${field} 格式不正确`;
        }
    }

    return errors;
}

// 预定义的验证模式
export const ValidationPatterns = {
    // 节点与面试间ID：uuid 或其它不含路径分隔符的短标识
    identifier: /^[A-Za-z0-9_-]{1,64}$/,
};
