export const APP_NAME = 'messages-bridge';
export const APP_VERSION = '0.1.0';
