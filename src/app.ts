import express from 'express';
import cors from 'cors';
import { pool } from './connections';
import { appConfig } from './connections/config/app.config';
import { createApiRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

const app = express();

const corsOptions: cors.CorsOptions = {
  origin: (origin, callback) => {
    // Requests without an origin (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [appConfig.frontendUrl, ...appConfig.corsOrigins];

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  maxAge: 86400,
};

app.use(cors(corsOptions));
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Health check
app.get('/health', async (_req, res) => {
  try {
    await pool.query('SELECT 1');
    res.json({ status: 'ok', database: 'connected' });
  } catch {
    res.status(500).json({ status: 'error', database: 'disconnected' });
  }
});

app.use('/api', createApiRoutes(pool));

// Error handling
app.use(notFoundHandler);
app.use(errorHandler);

export default app;
