export const NATS_CONNECTION = 'NATS_CONNECTION';
export { NATS_TOPICS, VALIDATED_ENV } from '@config/env-config.provider';
export const LOGGER = 'LOGGER';
export const EVENT_PUBLISHER = 'EVENT_PUBLISHER';
export const COMMAND_SUBSCRIBER = 'COMMAND_SUBSCRIBER';
