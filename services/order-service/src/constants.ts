export const SERVICE_DEFAULTS = { serviceName: 'order-service', port: 3001 };

export const PAYMENT_UPDATES_QUEUE = 'order-service.payment-updates';
export const CONSUMER_GROUP = 'order-service';

export const ORDER_UNIT_OF_WORK = 'ORDER_UNIT_OF_WORK';
