/**
 * 扩展Express Request接口
 */
declare global {
    namespace Express {
        interface Request {
            // 上游令牌校验后得到的调用方身份
            identity?: string;
            startTime?: number;
        }
    }
}

export {};
