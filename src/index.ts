// Main Application Entry Point
// Purpose: Initialize Express server, database and the disqualification schedule

import 'reflect-metadata';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createServer } from 'http';
import config, { validateEnv } from './config/env';
import { checkConnection, closeDatabase, initializeDatabase } from './config/database';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { requestLogger } from './middlewares/requestLogger';
import { DisqualificationService } from './services/disqualificationService';
import routes from './routes';

// Validate environment variables early
validateEnv();

// Create Express app
const app = express();
const httpServer = createServer(app);

// ============================================
// MIDDLEWARE SETUP
// ============================================

app.use(cors({
  origin: '*',
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
}));

// Parse JSON bodies
app.use(express.json({ limit: '100kb' }));

// Log all requests
app.use(requestLogger);

// ============================================
// HEALTH CHECK ENDPOINT
// ============================================

/**
 * GET /health
 * Returns database connection status
 */
app.get('/health', async (req: Request, res: Response) => {
  const dbHealthy = await checkConnection();

  res.status(dbHealthy ? 200 : 503).json({
    status: dbHealthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    database: dbHealthy ? 'connected' : 'disconnected',
  });
});

// ============================================
// API ROUTES
// ============================================

app.use('/api', routes);

// ============================================
// ERROR HANDLING
// ============================================

// 404 handler for unknown routes
app.use((req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: `Route ${req.method} ${req.path} not found`,
  });
});

// Global error handler
app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  logger.error('Unhandled error', {
    error: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  res.status(500).json({
    success: false,
    error: 'Internal server error. Please try again later.',
  });
});

// ============================================
// SERVER STARTUP
// ============================================

async function startServer(): Promise<void> {
  try {
    await initializeDatabase();
    const dbConnected = await checkConnection();
    if (!dbConnected) {
      throw new Error('Failed to connect to database');
    }
    logger.info('Database connection verified');

    DisqualificationService.init();

    httpServer.listen(config.PORT, '0.0.0.0', () => {
      logger.info('Server started', {
        port: config.PORT,
        environment: config.NODE_ENV,
        timeZone: config.TIMEZONE,
        url: `http://0.0.0.0:${config.PORT}`,
      });
    });
  } catch (error) {
    logger.error('Server startup failed', { error: errorMessage(error) });
    process.exit(1);
  }
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully`);
  DisqualificationService.stop();
  httpServer.close();
  try {
    await closeDatabase();
  } catch (error) {
    logger.error('Failed to close database', { error: errorMessage(error) });
  }
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

// Start the server
void startServer();
