export interface ApiResponse<T> {
    success: boolean;
    data?: T;
    error?: {
        code: string;
        message: string;
        details?: unknown;
    };
    meta?: {
        version: string;
        timestamp: number;
    };
}

export function createSuccessResponse<T>(data: T): ApiResponse<T> {
    return {
        success: true,
        data,
        meta: {
            version: '1.0',
            timestamp: Date.now()
        }
    };
}

export function createErrorResponse(
    code: string,
    message: string,
    details?: unknown
): ApiResponse<never> {
    return {
        success: false,
        error: {
            code,
            message,
            details
        },
        meta: {
            version: '1.0',
            timestamp: Date.now()
        }
    };
}

// 错误代码常量
export const ErrorCodes = {
    UNAUTHORIZED: 'UNAUTHORIZED',
    FORBIDDEN: 'FORBIDDEN',
    NOT_FOUND: 'NOT_FOUND',
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    SERVER_ERROR: 'SERVER_ERROR',
    RESUME_DEPTH_LIMIT: 'RESUME_DEPTH_LIMIT',
    RESUME_NOT_PUBLISHED: 'RESUME_NOT_PUBLISHED',
    STORAGE_FAILURE: 'STORAGE_FAILURE',
    RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
