import { Router, Request, Response } from 'express';
import { DeviceRecord } from '../types';
import { ServiceContainer } from '../services/container';
import { findDevice } from '../services/inventory-store';
import { requireJsonBody, validateGenerateRequest } from '../middleware/validator';
import { sendError, sendFailure, sendSuccess } from '../utils/api-response';
import logger from '../utils/logger';

export function createGenerateRoutes(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /generate
   * 자연어 요구사항으로 장비별 설정 생성
   * apply: true가 배포 확인 신호 (기본값 false: 생성만)
   */
  router.post('/', requireJsonBody, async (req: Request, res: Response): Promise<void> => {
    const validation = validateGenerateRequest(req.body);
    if (!validation.valid) {
      sendFailure(res, 400, `Invalid request: ${validation.reason}`);
      return;
    }

    const { requirements, devices, apply } = validation.value;

    try {
      const inventory = services.inventory.load();
      const records: DeviceRecord[] = devices
        ? devices.map(name => findDevice(inventory, name))
        : inventory;

      logger.info(`[API] Generate for ${records.length} devices (apply: ${apply})`);

      const report = await services.driver.run(
        records,
        { kind: 'generated', requirements },
        { confirm: async () => apply }
      );

      sendSuccess(res, report);
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
