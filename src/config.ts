import dotenv from 'dotenv';
dotenv.config();

const list = (value: string | undefined, fallback: string[]): string[] =>
  value ? value.split(',').map((o) => o.trim()).filter(Boolean) : fallback;

export const config = {
  port: Number(process.env.PORT || 3000),
  env: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'default_secret',
  jwtExpiresInSeconds: Number(process.env.JWT_EXPIRES_IN_SECONDS || 7 * 24 * 60 * 60),
  saltRounds: Number(process.env.BCRYPT_SALT_ROUNDS || 10),
  // support 5173, 5174 when the dev server port changes
  allowedOrigins: list(process.env.FRONTEND_ORIGIN, [
    'http://localhost:5173',
    'http://localhost:5174',
    'http://127.0.0.1:5173',
    'http://127.0.0.1:5174',
  ]),
  uploadDir: process.env.UPLOAD_DIR || 'uploads',
  maxUploadBytes: Number(process.env.MAX_UPLOAD_MB || 10) * 1024 * 1024,
  clinicName: process.env.CLINIC_NAME || 'Vet Clinic',
  enableJobs: process.env.ENABLE_JOBS !== 'false',
  smtp: {
    host: process.env.SMTP_HOST,
    port: Number(process.env.SMTP_PORT || 587),
    user: process.env.SMTP_USER,
    pass: process.env.SMTP_PASS,
    from: process.env.SMTP_FROM,
    timeoutMs: Number(process.env.SMTP_TIMEOUT_MS || 10000),
  },
};

export type AppConfig = typeof config;
