/**
 * Server Entry Point
 * Starts the Linkmap HTTP API
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  const app = createApp();
  const httpServer = createServer(app);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(env.PORT, () => resolve());
  });

  console.log('');
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log(`🚀 Linkmap Server is running`);
  console.log(`🚀 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🚀 Error statuses: ${env.ERROR_STATUS_CODES.join(', ')}`);
  console.log(`🚀 Local file URLs: ${env.ALLOW_LOCAL_FILES ? '✅ Allowed' : '⚠️  Disabled'}`);
  console.log(`🚀 API: http://localhost:${env.PORT}/health`);
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log('');

  const shutdown = (signal: string) => {
    console.log(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      console.log('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

// Start the server
startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
