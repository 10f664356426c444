export { createApp, createApiRouter, startServer, statusFor } from './server';
