import { Router, Request, Response } from 'express';
import { ApiResponse, CommandList, DeploymentResult, toSafeDevice } from '../types';
import { ServiceContainer } from '../services/container';
import { findDevice } from '../services/inventory-store';
import { renderInterfaceConfig } from '../services/command-renderer';
import { requireJsonBody, validateConfigureRequest } from '../middleware/validator';
import { sendError, sendFailure, sendSuccess } from '../utils/api-response';
import logger from '../utils/logger';

export interface ConfigureResponse {
  commands: CommandList;
  result?: DeploymentResult;
}

export function createDeviceRoutes(services: ServiceContainer): Router {
  const router = Router();

  /**
   * GET /devices
   * 인벤토리 목록 (비밀번호 제외)
   */
  router.get('/', (_req: Request, res: Response) => {
    try {
      sendSuccess(res, services.inventory.load().map(toSafeDevice));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /devices/:name
   */
  router.get('/:name', (req: Request, res: Response) => {
    try {
      const device = findDevice(services.inventory.load(), req.params.name);
      sendSuccess(res, toSafeDevice(device));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /devices/:name/configure
   * 인터페이스 템플릿 렌더링 후 배포 (dryRun이면 렌더링만)
   */
  router.post('/:name/configure', requireJsonBody, async (req: Request, res: Response): Promise<void> => {
    const validation = validateConfigureRequest(req.body);
    if (!validation.valid) {
      sendFailure(res, 400, `Invalid request: ${validation.reason}`);
      return;
    }

    const { action, interfaceName, ipAddress, subnetMask, dryRun } = validation.value;

    try {
      const device = findDevice(services.inventory.load(), req.params.name);
      const commands = renderInterfaceConfig(action, interfaceName, ipAddress, subnetMask);

      if (dryRun) {
        sendSuccess<ConfigureResponse>(res, { commands });
        return;
      }

      logger.info(`[API] Configure ${action} ${interfaceName} on ${device.name}`);
      const result = await services.orchestrator.deploy(device, commands);

      if (!result.succeeded) {
        const response: ApiResponse<ConfigureResponse> = {
          success: false,
          result: { commands, result },
          error: result.error,
          timestamp: new Date().toISOString()
        };
        res.status(502).json(response);
        return;
      }

      sendSuccess<ConfigureResponse>(res, { commands, result });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /devices/:name/interfaces
   * show ip interface brief 결과
   */
  router.get('/:name/interfaces', async (req: Request, res: Response): Promise<void> => {
    try {
      const device = findDevice(services.inventory.load(), req.params.name);
      const output = await services.orchestrator.queryInterfaces(device);
      sendSuccess(res, { output });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
