/**
 * Server-rendered page routes.
 *
 * GET  /                    dashboard
 * GET  /accounts            list, filtered by ?type= and ?status=
 * GET  /account/:id         detail
 * GET  /account/create      empty form
 * POST /account/create      create, or re-render with every error
 * GET  /account/:id/edit    prefilled form
 * POST /account/:id/edit    update, or re-render with every error
 * POST /account/:id/delete  delete
 *
 * A missing account always redirects to the list with an error notice.
 */

import { Request, Response, Router } from 'express';
import { AccountFormInput, fullName } from '../domain/account';
import { notFoundError } from '../domain/errors';
import { AccountService } from '../services/account-service';
import { asyncHandler } from '../api/middleware';
import { FlashCookie } from './flash';
import {
  formValuesFromAccount,
  renderAccountDetail,
  renderAccountForm,
  renderAccountList,
  renderDashboard,
} from './views';

/** First value of a query or form field; repeated fields keep the first. */
function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function formField(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(name in body)) return undefined;
  return firstString(Reflect.get(body, name));
}

/** Map submitted form fields (snake_case names) onto the raw input shape. */
export function readAccountForm(body: unknown): AccountFormInput {
  return {
    firstName: formField(body, 'first_name'),
    lastName: formField(body, 'last_name'),
    email: formField(body, 'email'),
    accountType: formField(body, 'account_type'),
    department: formField(body, 'department'),
    status: formField(body, 'status'),
    balance: formField(body, 'balance'),
  };
}

function sendHtml(res: Response, html: string): void {
  res.type('html').send(html);
}

export function createPageRoutes(service: AccountService, flash: FlashCookie): Router {
  const router = Router();

  const notFound = (res: Response, id: number) => {
    flash.push(res, { level: 'error', message: notFoundError('Account', id).message });
    res.redirect('/accounts');
  };

  const accountId = (req: Request) => Number(req.params.id);

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const [stats, recent] = await Promise.all([service.stats(), service.recent()]);
      sendHtml(res, renderDashboard(stats, recent, flash.consume(req, res)));
    }),
  );

  router.get(
    '/accounts',
    asyncHandler(async (req, res) => {
      const type = firstString(req.query.type) ?? '';
      const status = firstString(req.query.status) ?? '';
      const accounts = await service.list({
        accountType: type || undefined,
        status: status || undefined,
      });
      sendHtml(res, renderAccountList(accounts, { type, status }, flash.consume(req, res)));
    }),
  );

  router.get('/account/create', (req, res) => {
    sendHtml(res, renderAccountForm({ kind: 'create' }, {}, [], flash.consume(req, res)));
  });

  router.post(
    '/account/create',
    asyncHandler(async (req, res) => {
      const input = readAccountForm(req.body);
      const result = await service.create(input);
      if (result.status !== 'ok') {
        const errors = result.status === 'invalid' ? result.errors.map((e) => e.message) : [];
        sendHtml(res, renderAccountForm({ kind: 'create' }, input, errors, flash.consume(req, res)));
        return;
      }
      flash.push(res, {
        level: 'success',
        message: `Account created successfully for ${fullName(result.account)}!`,
      });
      res.redirect(`/account/${result.account.id}`);
    }),
  );

  router.get(
    '/account/:id(\\d+)',
    asyncHandler(async (req, res) => {
      const id = accountId(req);
      const account = await service.get(id);
      if (!account) {
        notFound(res, id);
        return;
      }
      sendHtml(res, renderAccountDetail(account, flash.consume(req, res)));
    }),
  );

  router.get(
    '/account/:id(\\d+)/edit',
    asyncHandler(async (req, res) => {
      const id = accountId(req);
      const account = await service.get(id);
      if (!account) {
        notFound(res, id);
        return;
      }
      const mode = { kind: 'edit', account } as const;
      sendHtml(res, renderAccountForm(mode, formValuesFromAccount(account), [], flash.consume(req, res)));
    }),
  );

  router.post(
    '/account/:id(\\d+)/edit',
    asyncHandler(async (req, res) => {
      const id = accountId(req);
      const input = readAccountForm(req.body);
      const result = await service.update(id, input);
      switch (result.status) {
        case 'not_found':
          notFound(res, id);
          return;
        case 'invalid': {
          const account = await service.get(id);
          if (!account) {
            notFound(res, id);
            return;
          }
          const errors = result.errors.map((e) => e.message);
          sendHtml(res, renderAccountForm({ kind: 'edit', account }, input, errors, flash.consume(req, res)));
          return;
        }
        case 'ok':
          flash.push(res, {
            level: 'success',
            message: `Account updated successfully for ${fullName(result.account)}!`,
          });
          res.redirect(`/account/${id}`);
      }
    }),
  );

  router.post(
    '/account/:id(\\d+)/delete',
    asyncHandler(async (req, res) => {
      const id = accountId(req);
      const result = await service.delete(id);
      if (result.status === 'not_found') {
        notFound(res, id);
        return;
      }
      flash.push(res, {
        level: 'success',
        message: `Account for ${fullName(result.account)} has been deleted successfully`,
      });
      res.redirect('/accounts');
    }),
  );

  return router;
}
