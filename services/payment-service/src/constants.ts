export const SERVICE_DEFAULTS = { serviceName: 'payment-service', port: 3002 };

export const ORDERS_QUEUE = 'payment-service.orders';
export const CONSUMER_GROUP = 'payment-service';

export const PAYMENT_UNIT_OF_WORK = 'PAYMENT_UNIT_OF_WORK';
export const PAYMENT_GATEWAY = 'PAYMENT_GATEWAY';
