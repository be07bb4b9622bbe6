import type { Request, Response, RequestHandler } from 'express';
import type { Services } from '../services';
import type { NodeMetadataChanges } from '../services/versionTreeManager';
import { createSuccessResponse } from '../utils/apiResponse';
import { asyncHandler, unwrapResult } from '../middleware/errorHandler';
import { currentIdentity } from '../middleware/auth';
import { toRecord, validateRequest, ValidationPatterns } from '../middleware/validateRequest';
import type { ValidationRule } from '../middleware/validateRequest';

const idParam: ValidationRule = {
    type: 'string',
    required: true,
    pattern: ValidationPatterns.identifier
};

// 可为 null 的文本字段：null 会跳过类型检查
const optionalNullableText = (max: number): ValidationRule => ({
    type: 'string',
    required: false,
    max
});

// undefined 表示未传入，null 表示清空
function optionalText(value: unknown): string | null | undefined {
    if (value === null) {
        return null;
    }
    return typeof value === 'string' ? value : undefined;
}

function requiredText(value: unknown): string {
    return typeof value === 'string' ? value : '';
}

function param(req: Request, name: string): string {
    return requiredText(req.params[name]);
}

export function createResumeTreeController(services: Services) {
    const { versionTree } = services;

    return {
        /**
         * 获取当前用户的全部简历树
         */
        listTrees: asyncHandler(async (req: Request, res: Response) => {
            const trees = unwrapResult(await versionTree.listTrees(currentIdentity(req)));
            res.json(createSuccessResponse(trees));
        }),

        /**
         * 可关联到面试间的已发布简历
         */
        getAvailable: asyncHandler(async (req: Request, res: Response) => {
            const nodes = unwrapResult(await versionTree.getAvailablePublished(currentIdentity(req)));
            res.json(createSuccessResponse(nodes));
        }),

        getStats: asyncHandler(async (req: Request, res: Response) => {
            const stats = unwrapResult(await versionTree.getStats(currentIdentity(req)));
            res.json(createSuccessResponse(stats));
        }),

        /**
         * 创建根简历
         */
        createRoot: [
            validateRequest({
                body: {
                    name: { type: 'string', required: true, min: 1, max: 100 },
                    targetCompany: optionalNullableText(100),
                    targetPosition: optionalNullableText(100)
                }
            }),
            asyncHandler(async (req: Request, res: Response) => {
                const body = toRecord(req.body);
                const node = unwrapResult(await versionTree.createRoot(
                    currentIdentity(req),
                    requiredText(body.name),
                    optionalText(body.targetCompany),
                    optionalText(body.targetPosition)
                ));
                res.status(201).json(createSuccessResponse(node));
            })
        ],

        getNode: [
            validateRequest({ params: { id: idParam } }),
            asyncHandler(async (req: Request, res: Response) => {
                const detail = unwrapResult(await versionTree.getNode(param(req, 'id'), currentIdentity(req)));
                res.json(createSuccessResponse(detail));
            })
        ],

        /**
         * 修改名称、目标公司和职位
         */
        updateMetadata: [
            validateRequest({
                params: { id: idParam },
                body: {
                    name: { type: 'string', required: false, min: 1, max: 100 },
                    targetCompany: optionalNullableText(100),
                    targetPosition: optionalNullableText(100)
                }
            }),
            asyncHandler(async (req: Request, res: Response) => {
                const body = toRecord(req.body);
                const changes: NodeMetadataChanges = {
                    name: typeof body.name === 'string' ? body.name : undefined,
                    targetCompany: optionalText(body.targetCompany),
                    targetPosition: optionalText(body.targetPosition)
                };
                const node = unwrapResult(await versionTree.updateMetadata(param(req, 'id'), currentIdentity(req), changes));
                res.json(createSuccessResponse(node));
            })
        ],

        /**
         * 更新简历内容；请求体即字段补丁，由服务层校验
         */
        updateContent: [
            validateRequest({ params: { id: idParam } }),
            asyncHandler(async (req: Request, res: Response) => {
                const content = unwrapResult(await versionTree.updateContent(param(req, 'id'), currentIdentity(req), req.body));
                res.json(createSuccessResponse(content));
            })
        ],

        fork: [
            validateRequest({ params: { id: idParam } }),
            asyncHandler(async (req: Request, res: Response) => {
                const child = unwrapResult(await versionTree.fork(param(req, 'id'), currentIdentity(req)));
                res.status(201).json(createSuccessResponse(child));
            })
        ],

        /**
         * 删除节点及其全部后代
         */
        deleteTree: [
            validateRequest({ params: { id: idParam } }),
            asyncHandler(async (req: Request, res: Response) => {
                const deleted = unwrapResult(await versionTree.deleteTree(param(req, 'id'), currentIdentity(req)));
                res.json(createSuccessResponse({ deleted }));
            })
        ],

        publish: [
            validateRequest({ params: { id: idParam } }),
            asyncHandler(async (req: Request, res: Response) => {
                const node = unwrapResult(await versionTree.publish(param(req, 'id'), currentIdentity(req)));
                res.json(createSuccessResponse(node));
            })
        ],

        unpublish: [
            validateRequest({ params: { id: idParam } }),
            asyncHandler(async (req: Request, res: Response) => {
                const node = unwrapResult(await versionTree.unpublish(param(req, 'id'), currentIdentity(req)));
                res.json(createSuccessResponse(node));
            })
        ],

        /**
         * 关联到面试间
         */
        linkToRoom: [
            validateRequest({
                params: { id: idParam },
                body: { roomId: { type: 'string', required: true, pattern: ValidationPatterns.identifier } }
            }),
            asyncHandler(async (req: Request, res: Response) => {
                const body = toRecord(req.body);
                const roomId = requiredText(body.roomId);
                unwrapResult(await versionTree.linkToRoom(param(req, 'id'), roomId, currentIdentity(req)));
                res.json(createSuccessResponse({ resumeId: param(req, 'id'), roomId }));
            })
        ]
    } satisfies Record<string, RequestHandler | RequestHandler[]>;
}

export type ResumeTreeController = ReturnType<typeof createResumeTreeController>;
