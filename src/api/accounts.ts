/**
 * Account JSON API routes (read-only).
 *
 * GET /accounts     every account
 * GET /account/:id  one account, 404 when absent
 * GET /stats        dashboard aggregates
 */

import { Router } from 'express';
import { notFoundError } from '../domain/errors';
import { AccountService } from '../services/account-service';
import { toAccountJson, toStatsJson } from './serializers';
import { asyncHandler } from './middleware';

export function createAccountApiRoutes(service: AccountService): Router {
  const router = Router();

  router.get(
    '/accounts',
    asyncHandler(async (_req, res) => {
      const accounts = await service.list();
      res.json({
        success: true,
        count: accounts.length,
        accounts: accounts.map(toAccountJson),
      });
    }),
  );

  router.get(
    '/account/:id(\\d+)',
    asyncHandler(async (req, res) => {
      const id = Number(req.params.id);
      const account = await service.get(id);
      if (!account) {
        res.status(404).json({ success: false, message: notFoundError('Account', id).message });
        return;
      }
      res.json({ success: true, account: toAccountJson(account) });
    }),
  );

  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      res.json({ success: true, stats: toStatsJson(await service.stats()) });
    }),
  );

  return router;
}
