import 'dotenv/config';
import http from 'http';
import { loadConfig } from './config.js';
import { API_PREFIX, createApp, createDependencies } from './app.js';

const config = loadConfig();
const dependencies = createDependencies(config);
const app = createApp(dependencies);
const server = http.createServer(app);

server.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
  console.log(`Side-effect analysis: POST ${API_PREFIX}/side-effects/analyze`);
  console.log(`LLM: ${dependencies.generator ? config.gemini.model : 'not configured, rule-based fallback only'}`);
  console.log(`Voice reminders: ${dependencies.callPlacer ? 'enabled' : 'disabled (Twilio not configured)'}`);
});

let isShuttingDown = false;

function isServerNotRunning(error: Error): boolean {
  return 'code' in error && error.code === 'ERR_SERVER_NOT_RUNNING';
}

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    console.log(`Shutdown already in progress, ignoring ${signal}`);
    return;
  }

  isShuttingDown = true;
  console.log(`\n${signal} received - Shutting down gracefully...`);

  let exitCode = 0;

  try {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err && !isServerNotRunning(err)) {
          console.error('Error closing HTTP server:', err);
          reject(err);
        } else {
          console.log('HTTP server closed');
          resolve();
        }
      });
    });

    console.log('Graceful shutdown complete');
  } catch (error) {
    console.error('Error during shutdown:', error);
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  void gracefulShutdown('UNHANDLED_REJECTION');
});
