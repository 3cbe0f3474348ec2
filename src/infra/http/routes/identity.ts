import { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { UserStore } from '../../../application/identity/userStore.js';
import type { TokenService } from '../../../application/identity/tokens.js';
import type { EmailSender } from '../../../application/identity/emailSender.js';
import { ConfirmationEmailService } from '../../../application/identity/confirmationEmail.js';
import { RegisterUseCase } from '../../../application/identity/register.js';
import { LoginUseCase, type SignInOptions } from '../../../application/identity/login.js';
import { RefreshUseCase } from '../../../application/identity/refresh.js';
import { LogoutUseCase } from '../../../application/identity/logout.js';
import {
  ConfirmEmailUseCase,
  EMAIL_CONFIRMED_MESSAGE,
  ResendConfirmationEmailUseCase,
} from '../../../application/identity/confirmEmail.js';
import { ForgotPasswordUseCase, ResetPasswordUseCase } from '../../../application/identity/passwordReset.js';
import { GetInfoUseCase, UpdateInfoUseCase } from '../../../application/identity/manageInfo.js';
import { authMiddleware, requireUserId, type AuthRequest } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

// Identity paths are annotated under the default /identity prefix;
// createSwaggerSpec moves them under the configured one.

/**
 * @openapi
 * components:
 *   schemas:
 *     AccessTokenResponse:
 *       type: object
 *       required: [tokenType, accessToken, expiresIn, refreshToken]
 *       properties:
 *         tokenType: { type: string, example: Bearer }
 *         accessToken: { type: string }
 *         expiresIn: { type: integer, example: 3600 }
 *         refreshToken: { type: string }
 *     InfoResponse:
 *       type: object
 *       required: [email, isEmailConfirmed]
 *       properties:
 *         email: { type: string, format: email }
 *         isEmailConfirmed: { type: boolean }
 *
 * /identity/register:
 *   post:
 *     tags: [Identity]
 *     summary: Register a new user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: User created; a confirmation link was emailed
 *       400:
 *         description: Invalid email, duplicate user name or weak password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /identity/login:
 *   post:
 *     tags: [Identity]
 *     summary: Exchange credentials for a bearer and refresh token
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, password]
 *             properties:
 *               email: { type: string, format: email }
 *               password: { type: string }
 *     responses:
 *       200:
 *         description: Authenticated
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AccessTokenResponse'
 *       401:
 *         description: Invalid credentials, locked out or email not confirmed
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       429:
 *         description: Too many login attempts
 *
 * /identity/refresh:
 *   post:
 *     tags: [Identity]
 *     summary: Exchange a refresh token for a new token pair
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [refreshToken]
 *             properties:
 *               refreshToken: { type: string }
 *     responses:
 *       200:
 *         description: New token pair
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/AccessTokenResponse'
 *       401:
 *         description: Invalid, expired or revoked refresh token
 *
 * /identity/logout:
 *   post:
 *     tags: [Identity]
 *     summary: Revoke outstanding refresh tokens
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Signed out
 *       401:
 *         description: Missing or invalid bearer token
 *
 * /identity/confirmEmail:
 *   get:
 *     tags: [Identity]
 *     summary: Confirm an email address from an emailed link
 *     parameters:
 *       - { in: query, name: userId, required: true, schema: { type: string } }
 *       - { in: query, name: code, required: true, schema: { type: string } }
 *       - { in: query, name: changedEmail, required: false, schema: { type: string } }
 *     responses:
 *       200:
 *         description: Email confirmed
 *         content:
 *           text/plain:
 *             schema: { type: string }
 *       401:
 *         description: Unknown user or invalid code
 *
 * /identity/resendConfirmationEmail:
 *   post:
 *     tags: [Identity]
 *     summary: Send another confirmation link
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string }
 *     responses:
 *       200:
 *         description: Accepted, whether or not the address is registered
 *
 * /identity/forgotPassword:
 *   post:
 *     tags: [Identity]
 *     summary: Email a password reset code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email]
 *             properties:
 *               email: { type: string }
 *     responses:
 *       200:
 *         description: Accepted, whether or not the address is registered
 *
 * /identity/resetPassword:
 *   post:
 *     tags: [Identity]
 *     summary: Set a new password with an emailed reset code
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [email, resetCode, newPassword]
 *             properties:
 *               email: { type: string }
 *               resetCode: { type: string }
 *               newPassword: { type: string }
 *     responses:
 *       200:
 *         description: Password changed
 *       400:
 *         description: Invalid code or weak password
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *
 * /identity/manage/info:
 *   get:
 *     tags: [Identity]
 *     summary: Current account info
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Account info
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/InfoResponse'
 *       401:
 *         description: Missing or invalid bearer token
 *   post:
 *     tags: [Identity]
 *     summary: Change password and/or start an email change
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             properties:
 *               newEmail: { type: string }
 *               newPassword: { type: string }
 *               oldPassword: { type: string }
 *     responses:
 *       200:
 *         description: Account info after the change
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/InfoResponse'
 *       400:
 *         description: Missing or wrong old password, weak password or invalid email
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

const credentialsBodySchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

const refreshBodySchema = z.object({
  refreshToken: z.string().min(1),
});

const confirmEmailQuerySchema = z.object({
  userId: z.string().min(1),
  code: z.string().min(1),
  changedEmail: z.string().min(1).optional(),
});

const emailBodySchema = z.object({
  email: z.string().min(1),
});

const resetPasswordBodySchema = z.object({
  email: z.string().min(1),
  resetCode: z.string().min(1),
  newPassword: z.string(),
});

const updateInfoBodySchema = z.object({
  newEmail: z.string().optional(),
  newPassword: z.string().optional(),
  oldPassword: z.string().optional(),
});

export interface IdentityRouteDeps {
  userStore: UserStore;
  tokens: TokenService;
  emailSender: EmailSender;
  signIn: SignInOptions;
  publicBaseUrl: string;
  identityPathPrefix: string;
  loginRateLimiter: RequestHandler;
}

/**
 * The identity endpoint group. Mount it at `deps.identityPathPrefix`; the
 * prefix is also baked into emailed confirmation links.
 */
export function createIdentityRoutes(deps: IdentityRouteDeps) {
  const router = Router();
  const { userStore, tokens, emailSender } = deps;
  const requireAuth = authMiddleware(tokens);

  const confirmation = new ConfirmationEmailService(tokens, emailSender, {
    publicBaseUrl: deps.publicBaseUrl,
    identityPathPrefix: deps.identityPathPrefix,
  });
  const registerUseCase = new RegisterUseCase(userStore, confirmation);
  const loginUseCase = new LoginUseCase(userStore, tokens, deps.signIn);
  const refreshUseCase = new RefreshUseCase(userStore, tokens, deps.signIn.requireConfirmedEmail);
  const logoutUseCase = new LogoutUseCase(userStore);
  const confirmEmailUseCase = new ConfirmEmailUseCase(userStore, tokens);
  const resendConfirmationUseCase = new ResendConfirmationEmailUseCase(userStore, confirmation);
  const forgotPasswordUseCase = new ForgotPasswordUseCase(userStore, tokens, emailSender);
  const resetPasswordUseCase = new ResetPasswordUseCase(userStore, tokens);
  const getInfoUseCase = new GetInfoUseCase(userStore);
  const updateInfoUseCase = new UpdateInfoUseCase(userStore, confirmation);

  router.post(
    '/register',
    validate({ body: credentialsBodySchema }),
    asyncHandler(async (req, res) => {
      await registerUseCase.execute(credentialsBodySchema.parse(req.body));
      res.status(200).end();
    })
  );

  router.post(
    '/login',
    deps.loginRateLimiter,
    validate({ body: credentialsBodySchema }),
    asyncHandler(async (req, res) => {
      const result = await loginUseCase.execute(credentialsBodySchema.parse(req.body));
      res.status(200).json(result);
    })
  );

  router.post(
    '/refresh',
    validate({ body: refreshBodySchema }),
    asyncHandler(async (req, res) => {
      const result = await refreshUseCase.execute(refreshBodySchema.parse(req.body));
      res.status(200).json(result);
    })
  );

  router.post(
    '/logout',
    requireAuth,
    asyncHandler(async (req: AuthRequest, res) => {
      await logoutUseCase.execute(requireUserId(req));
      res.status(200).end();
    })
  );

  router.get(
    '/confirmEmail',
    validate({ query: confirmEmailQuerySchema }),
    asyncHandler(async (req, res) => {
      await confirmEmailUseCase.execute(confirmEmailQuerySchema.parse(req.query));
      res.status(200).type('text/plain').send(EMAIL_CONFIRMED_MESSAGE);
    })
  );

  router.post(
    '/resendConfirmationEmail',
    validate({ body: emailBodySchema }),
    asyncHandler(async (req, res) => {
      await resendConfirmationUseCase.execute(emailBodySchema.parse(req.body));
      res.status(200).end();
    })
  );

  router.post(
    '/forgotPassword',
    validate({ body: emailBodySchema }),
    asyncHandler(async (req, res) => {
      await forgotPasswordUseCase.execute(emailBodySchema.parse(req.body));
      res.status(200).end();
    })
  );

  router.post(
    '/resetPassword',
    validate({ body: resetPasswordBodySchema }),
    asyncHandler(async (req, res) => {
      await resetPasswordUseCase.execute(resetPasswordBodySchema.parse(req.body));
      res.status(200).end();
    })
  );

  router.get(
    '/manage/info',
    requireAuth,
    asyncHandler(async (req: AuthRequest, res) => {
      res.status(200).json(await getInfoUseCase.execute(requireUserId(req)));
    })
  );

  router.post(
    '/manage/info',
    requireAuth,
    validate({ body: updateInfoBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const body = updateInfoBodySchema.parse(req.body);
      res.status(200).json(await updateInfoUseCase.execute({ userId: requireUserId(req), ...body }));
    })
  );

  return router;
}
