import { logger } from './logger';

// 核心操作的失败类型
export enum TreeErrorKind {
    VALIDATION = 'ValidationError',
    NOT_FOUND = 'NotFound',
    PERMISSION_DENIED = 'PermissionDenied',
    DEPTH_LIMIT_EXCEEDED = 'DepthLimitExceeded',
    NOT_PUBLISHED = 'NotPublished',
    STORAGE_FAILURE = 'StorageFailure'
}

export interface TreeError {
    kind: TreeErrorKind;
    message: string;
    details?: Record<string, unknown>;
}

export interface Success<T> {
    ok: true;
    value: T;
}

export interface Failure {
    ok: false;
    error: TreeError;
}

export type Result<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function failure(
    kind: TreeErrorKind,
    message: string,
    details?: Record<string, unknown>
): Failure {
    return { ok: false, error: { kind, message, details } };
}

/**
 * 执行一次存储操作：业务失败按原样返回，存储层抛出的异常转换为 StorageFailure。
 * 成功时记录 info，业务失败记录 warn，存储失败记录 error。
 */
export async function runOperation<T>(
    operation: string,
    meta: Record<string, unknown>,
    work: () => Promise<Result<T>>
): Promise<Result<T>> {
    let result: Result<T>;

    try {
        result = await work();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('存储操作失败', { operation, ...meta, error });
        return failure(TreeErrorKind.STORAGE_FAILURE, `存储操作失败: ${message}`, { operation });
    }

    if (result.ok) {
        logger.debug('操作完成', { operation, ...meta });
    } else {
        logger.warn('操作被拒绝', { operation, ...meta, kind: result.error.kind, reason: result.error.message });
    }

    return result;
}
