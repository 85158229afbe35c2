import { Router } from 'express';
import { z } from 'zod';
import { TokenService } from '../../../application/auth/tokenService.js';
import { NotFoundError } from '../../../application/errors.js';
import { ChangePasswordUseCase } from '../../../application/users/changePassword.js';
import { CreateUserUseCase } from '../../../application/users/createUser.js';
import { DeleteUserUseCase } from '../../../application/users/deleteUser.js';
import { DEFAULT_PAGE_SIZE, UserQueries } from '../../../application/users/queries.js';
import { SetUserActiveUseCase } from '../../../application/users/setUserActive.js';
import { UpdateUserUseCase } from '../../../application/users/updateUser.js';
import { authMiddleware, requireAuth } from '../middleware/auth.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/v1/users:
 *   post:
 *     tags: [Users]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, username, firstName, lastName, password]
 *             properties:
 *               email: { type: string, format: email }
 *               username: { type: string, minLength: 3, maxLength: 50 }
 *               firstName: { type: string }
 *               lastName: { type: string }
 *               password: { type: string, minLength: 8 }
 *     responses:
 *       201: { description: User created }
 *       400:
 *         description: Validation error (including weak password)
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Email or username already exists
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Users]
 *     summary: List users
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: limit
 *         schema: { type: integer, default: 100 }
 *       - in: query
 *         name: offset
 *         schema: { type: integer, default: 0 }
 *     responses:
 *       200: { description: OK }
 *
 * /api/v1/users/me:
 *   get:
 *     tags: [Users]
 *     summary: Current user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *
 * /api/v1/users/me/password:
 *   put:
 *     tags: [Users]
 *     summary: Change own password
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [currentPassword, newPassword]
 *             properties:
 *               currentPassword: { type: string }
 *               newPassword: { type: string, minLength: 8 }
 *     responses:
 *       204: { description: Password changed }
 *
 * /api/v1/users/{id}:
 *   get:
 *     tags: [Users]
 *     summary: Get a user
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string, format: uuid }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: User not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   put:
 *     tags: [Users]
 *     summary: Update first/last name
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *   delete:
 *     tags: [Users]
 *     summary: Delete a user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       204: { description: Deleted }
 *
 * /api/v1/users/{id}/deactivate:
 *   post:
 *     tags: [Users]
 *     summary: Deactivate a user (blocks login)
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *
 * /api/v1/users/{id}/activate:
 *   post:
 *     tags: [Users]
 *     summary: Reactivate a user
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 */

const createUserBodySchema = z.object({
  email: z.string().email(),
  username: z.string().min(3).max(50),
  firstName: z.string().min(1),
  lastName: z.string().min(1),
  password: z.string().min(1),
});

const updateUserBodySchema = z.object({
  firstName: z.string().min(1).optional(),
  lastName: z.string().min(1).optional(),
});

const changePasswordBodySchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(1),
});

const idParamsSchema = z.object({
  id: z.string().uuid(),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(DEFAULT_PAGE_SIZE),
  offset: z.coerce.number().int().min(0).default(0),
});

export interface UserRouteDeps {
  tokenService: TokenService;
  createUser: CreateUserUseCase;
  updateUser: UpdateUserUseCase;
  setUserActive: SetUserActiveUseCase;
  changePassword: ChangePasswordUseCase;
  deleteUser: DeleteUserUseCase;
  queries: UserQueries;
}

export function createUserRoutes(deps: UserRouteDeps) {
  const router = Router();
  const requireToken = authMiddleware(deps.tokenService);

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const user = await deps.createUser.execute(body);
      res.status(201).json(user);
    })
  );

  router.get(
    '/',
    requireToken,
    asyncHandler(async (req, res) => {
      const { limit, offset } = listQuerySchema.parse(req.query);
      res.json(await deps.queries.list(limit, offset));
    })
  );

  // /me routes come before /:id so "me" is not parsed as an id
  router.get(
    '/me',
    requireToken,
    asyncHandler(async (req, res) => {
      const { subjectId } = requireAuth(req);
      const user = await deps.queries.getById(subjectId);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.json(user);
    })
  );

  router.put(
    '/me/password',
    requireToken,
    asyncHandler(async (req, res) => {
      const { subjectId } = requireAuth(req);
      const body = changePasswordBodySchema.parse(req.body);
      await deps.changePassword.execute({ userId: subjectId, ...body });
      res.status(204).end();
    })
  );

  router.get(
    '/:id',
    requireToken,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const user = await deps.queries.getById(id);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      res.json(user);
    })
  );

  router.put(
    '/:id',
    requireToken,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      const body = updateUserBodySchema.parse(req.body);
      res.json(await deps.updateUser.execute({ userId: id, ...body }));
    })
  );

  router.post(
    '/:id/deactivate',
    requireToken,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.setUserActive.execute({ userId: id, active: false }));
    })
  );

  router.post(
    '/:id/activate',
    requireToken,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      res.json(await deps.setUserActive.execute({ userId: id, active: true }));
    })
  );

  router.delete(
    '/:id',
    requireToken,
    asyncHandler(async (req, res) => {
      const { id } = idParamsSchema.parse(req.params);
      await deps.deleteUser.execute(id);
      res.status(204).end();
    })
  );

  return router;
}
