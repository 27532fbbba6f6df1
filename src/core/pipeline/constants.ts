/**
 * Largest request body accepted, in bytes
 */
export const MAX_REQUEST_BODY_SIZE = 131072;

export const SIGNATURE_HEADER = 'x-hub-signature-256';
export const EVENT_TYPE_HEADER = 'x-github-event';
export const DELIVERY_ID_HEADER = 'x-github-delivery';
export const CONTENT_TYPE_HEADER = 'content-type';

export const DEFAULT_CHARSET = 'utf-8';
