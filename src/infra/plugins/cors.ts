/**
 * CORS plugin for Fastify
 * Allowed origins come from ALLOWED_ORIGINS and CLIENT_BASE_URL; development also admits localhost.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Collects configured origins into a set.
 */
export function getAllowedOrigins(config: AppConfig): Set<string> {
  const set = new Set<string>();

  const { allowedOrigins, clientBaseUrl } = config.cors;

  if (allowedOrigins !== undefined && allowedOrigins !== '') {
    allowedOrigins
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
      .forEach((origin) => set.add(origin));
  }

  if (clientBaseUrl !== undefined && clientBaseUrl !== '') {
    set.add(clientBaseUrl.trim());
  }

  return set;
}

export function isLocalhostOrigin(origin: string): boolean {
  if (!URL.canParse(origin)) {
    return false;
  }

  const url = new URL(origin);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return false;
  }

  // Exact hostname match; a prefix check would admit localhost.example.com
  return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOrigins(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server and same-origin requests carry no Origin header
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(new Error('CORS origin not allowed'), false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'authorization', 'accept', 'x-requested-with'],
    exposedHeaders: ['content-length'],
    credentials: true,
  });
}
