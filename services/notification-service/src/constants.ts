export const SERVICE_DEFAULTS = { serviceName: 'notification-service', port: 3003 };

export const PAYMENTS_QUEUE = 'notification-service.payments';
export const CONSUMER_GROUP = 'notification-service';

export const NOTIFICATION_UNIT_OF_WORK = 'NOTIFICATION_UNIT_OF_WORK';
export const MAILER = 'MAILER';
