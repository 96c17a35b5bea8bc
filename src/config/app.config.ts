import { intFromEnv } from './env';

export default () => ({
  app: {
    port: intFromEnv('PORT', 3000),
    serviceName: process.env.SERVICE_NAME || 'order-service',
  },
});
