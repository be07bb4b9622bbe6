import type { OwnedResource } from '../models/domain';
import { logger } from '../utils/logger';
import { TreeErrorKind, failure, success } from '../utils/result';
import type { Result } from '../utils/result';

export interface ResourceRef {
    type: string;
    id: string;
}

/**
 * 水平鉴权：调用方身份必须与资源所有者一致。
 * 简历节点、面试间等所有带 ownerIdentity 的资源共用这一个检查。
 */
export class AuthorizationGate {
    authorize(identity: string, resource: OwnedResource, ref?: ResourceRef): Result<void> {
        if (resource.ownerIdentity === identity) {
            return success(undefined);
        }

        logger.warn('水平越权尝试', {
            identity,
            owner: resource.ownerIdentity,
            resource: ref
        });

        return failure(
            TreeErrorKind.PERMISSION_DENIED,
            '无权访问此资源',
            ref ? { resourceType: ref.type, resourceId: ref.id } : undefined
        );
    }
}
