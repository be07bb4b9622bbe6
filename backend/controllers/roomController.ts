import type { Request, Response, RequestHandler } from 'express';
import type { Services } from '../services';
import { createSuccessResponse } from '../utils/apiResponse';
import { asyncHandler, unwrapResult } from '../middleware/errorHandler';
import { currentIdentity } from '../middleware/auth';
import { toRecord, validateRequest, ValidationPatterns } from '../middleware/validateRequest';

const roomIdParams = {
    id: { type: 'string', required: true, pattern: ValidationPatterns.identifier }
} as const;

export function createRoomController(services: Services) {
    const { rooms, versionTree } = services;

    return {
        createRoom: [
            validateRequest({ body: { name: { type: 'string', required: false, max: 100 } } }),
            asyncHandler(async (req: Request, res: Response) => {
                const body = toRecord(req.body);
                const name = typeof body.name === 'string' ? body.name : undefined;
                const room = unwrapResult(await rooms.createRoom(currentIdentity(req), name));
                res.status(201).json(createSuccessResponse(room));
            })
        ],

        getRoom: [
            validateRequest({ params: roomIdParams }),
            asyncHandler(async (req: Request, res: Response) => {
                const room = unwrapResult(await rooms.getRoom(req.params.id, currentIdentity(req)));
                res.json(createSuccessResponse(room));
            })
        ],

        /**
         * 面试间当前关联的简历及其内容
         */
        getRoomResume: [
            validateRequest({ params: roomIdParams }),
            asyncHandler(async (req: Request, res: Response) => {
                const resume = unwrapResult(await versionTree.getResumeForRoom(req.params.id, currentIdentity(req)));
                res.json(createSuccessResponse(resume));
            })
        ]
    } satisfies Record<string, RequestHandler | RequestHandler[]>;
}

export type RoomController = ReturnType<typeof createRoomController>;
