import { Router } from 'express';
import type { TokenService } from '../../../application/identity/tokens.js';
import { generateForecast } from '../../../domain/forecast/weatherForecast.js';
import { authMiddleware } from '../middleware/auth.js';

/**
 * @openapi
 * /weatherforecast:
 *   get:
 *     tags: [Forecast]
 *     summary: Sample protected resource
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Five-day forecast
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items:
 *                 type: object
 *                 required: [date, temperatureC, temperatureF, summary]
 *                 properties:
 *                   date: { type: string, format: date }
 *                   temperatureC: { type: integer }
 *                   temperatureF: { type: integer }
 *                   summary: { type: string }
 *       401:
 *         description: Missing or invalid bearer token
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */
export function createForecastRoutes(tokens: TokenService, random: () => number = Math.random) {
  const router = Router();

  router.get('/weatherforecast', authMiddleware(tokens), (_req, res) => {
    res.status(200).json(generateForecast(5, random));
  });

  return router;
}
