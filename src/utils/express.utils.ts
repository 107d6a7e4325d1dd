import express, { Application } from 'express';
import { MongoClient } from "mongodb";
import { Server } from "http";
import bodyParser from "body-parser";
import cors from "cors";
import qs from 'qs';

import { NotFoundError } from "../errors/index.js";
import { errorHandler } from "../middleware/error-handler.js";
import { IBaseApiConfig } from "../models/base-api-config.interface.js";
import { IDatabase } from "../databases/models/database.interface.js";

export type RouteSetupFunction = (app: Application, database: IDatabase, config: IBaseApiConfig) => void;

const SERVER_CLOSE_TIMEOUT_MS = 5000;

// '*' anywhere in the list opens CORS to every origin; the request's origin is reflected so credentials still work
function getCorsOrigin(allowedOrigins: string[]): boolean | string[] {
  return allowedOrigins.includes('*') ? true : allowedOrigins;
}

function setupExpressApp(database: IDatabase, config: IBaseApiConfig, setupRoutes: RouteSetupFunction): Application {
  const app: Application = express();

  // Use the 'qs' library for parsing query strings which allows for nested objects
  app.set('query parser', (str: string) => qs.parse(str));

  // request logging, before any other middleware
  app.use((req, res, next) => {
    if (config.env !== 'test') {
      const startTime = Date.now();
      console.log(`[${new Date().toISOString()}] INCOMING REQUEST: ${req.method} ${req.path}`);
      res.on('finish', () => {
        console.log(`[${new Date().toISOString()}] ${req.method} ${req.path} ${res.statusCode} - ${Date.now() - startTime}ms`);
      });
    }
    next();
  });

  // cors before body parsing: parse errors carry the CORS headers too
  app.use(cors({
    origin: getCorsOrigin(config.network.corsAllowedOrigins),
    credentials: true
  }));
  app.use(bodyParser.json());

  setupRoutes(app, database, config); // setupRoutes calls every controller to map its own routes

  app.use(async (req) => {
    throw new NotFoundError(`Requested path, ${req.path}, Not Found`);
  });

  app.use(errorHandler);
  return app;
}

// ******** Shutdown ********
/**
 * Closes the HTTP server (giving up after a timeout), then the MongoDB connection, then exits.
 */
function performGracefulShutdown(
  signal: string,
  mongoClient: MongoClient | null,
  server: Server | null
): Promise<void> {
  console.log(`${signal} received, shutting down`);

  const closeMongoConnection = async (): Promise<void> => {
    if (mongoClient) {
      console.log('closing mongodb connection');
      try {
        await mongoClient.close();
        console.log('MongoDB connection closed successfully');
      } catch (err) {
        console.error('Error closing MongoDB connection:', err);
      }
    }
  };

  const shutdownServer = new Promise<void>((resolve) => {
    if (!server) {
      resolve();
      return;
    }

    const timeout = setTimeout(() => {
      console.log('Server shutdown timeout reached, proceeding with MongoDB cleanup');
      resolve();
    }, SERVER_CLOSE_TIMEOUT_MS);

    console.log('Closing HTTP server...');
    server.close((err) => {
      if (err) console.error('Error closing HTTP server:', err);
      console.log('HTTP server closed');
      clearTimeout(timeout);
      resolve();
    });
  });

  return shutdownServer
    .then(() => closeMongoConnection())
    .then(() => {
      console.log('Cleanup complete, exiting process');
      process.exit(0);
    });
}

export const expressUtils = {
  setupExpressApp,
  performGracefulShutdown,
};
