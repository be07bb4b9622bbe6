import { describe, expect, it } from 'vitest';
import { ErrorCodes } from '../utils/apiResponse';
import { TreeErrorKind, failure, success } from '../utils/result';
import { ApplicationError, toApplicationError, unwrapResult } from './errorHandler';

describe('toApplicationError', () => {
    it.each([
        [TreeErrorKind.VALIDATION, 400, ErrorCodes.VALIDATION_ERROR],
        [TreeErrorKind.NOT_FOUND, 404, ErrorCodes.NOT_FOUND],
        [TreeErrorKind.PERMISSION_DENIED, 403, ErrorCodes.FORBIDDEN],
        [TreeErrorKind.DEPTH_LIMIT_EXCEEDED, 422, ErrorCodes.RESUME_DEPTH_LIMIT],
        [TreeErrorKind.NOT_PUBLISHED, 409, ErrorCodes.RESUME_NOT_PUBLISHED],
        [TreeErrorKind.STORAGE_FAILURE, 500, ErrorCodes.STORAGE_FAILURE]
    ])('maps %s to HTTP %i', (kind, statusCode, code) => {
        const error = toApplicationError({ kind, message: 'msg', details: { id: 'x' } });

        expect(error).toBeInstanceOf(ApplicationError);
        expect(error.statusCode).toBe(statusCode);
        expect(error.code).toBe(code);
        expect(error.message).toBe('msg');
        expect(error.details).toEqual({ id: 'x' });
    });
});

describe('unwrapResult', () => {
    it('returns the value of a success', () => {
        expect(unwrapResult(success(3))).toBe(3);
    });

    it('throws the mapped error for a failure', () => {
        let thrown: unknown;
        try {
            unwrapResult(failure(TreeErrorKind.NOT_PUBLISHED, '未发布'));
        } catch (error) {
            thrown = error;
        }

        expect(thrown).toBeInstanceOf(ApplicationError);
        expect(thrown).toMatchObject({ statusCode: 409, code: ErrorCodes.RESUME_NOT_PUBLISHED, message: '未发布' });
    });
});
