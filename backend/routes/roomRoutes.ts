import express from 'express';
import type { Router } from 'express';
import type { Services } from '../services';
import { createRoomController } from '../controllers/roomController';
import { authenticateToken, requireAuth } from '../middleware/auth';

export function createRoomRoutes(services: Services): Router {
    const router = express.Router();
    const controller = createRoomController(services);

    router.use(authenticateToken, requireAuth);

    router.post('/', controller.createRoom);
    router.get('/:id', controller.getRoom);
    router.get('/:id/resume', controller.getRoomResume);

    return router;
}
