import express from 'express';
import type { Router } from 'express';
import type { Services } from '../services';
import { createResumeTreeController } from '../controllers/resumeTreeController';
import { authenticateToken, requireAuth } from '../middleware/auth';

export function createResumeRoutes(services: Services): Router {
    const router = express.Router();
    const controller = createResumeTreeController(services);

    // 所有简历接口都需要调用方身份
    router.use(authenticateToken, requireAuth);

    // 简历树、可关联列表和统计
    router.get('/trees', controller.listTrees);
    router.get('/available', controller.getAvailable);
    router.get('/stats', controller.getStats);

    // 创建根简历
    router.post('/', controller.createRoot);

    // 单个版本
    router.get('/:id', controller.getNode);
    router.patch('/:id', controller.updateMetadata);
    router.delete('/:id', controller.deleteTree);
    router.put('/:id/content', controller.updateContent);

    // 版本操作
    router.post('/:id/fork', controller.fork);
    router.post('/:id/publish', controller.publish);
    router.post('/:id/unpublish', controller.unpublish);
    router.post('/:id/link-room', controller.linkToRoom);

    return router;
}
