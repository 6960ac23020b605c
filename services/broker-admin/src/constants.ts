export const SERVICE_DEFAULTS = { serviceName: 'broker-admin', port: 3004 };
