import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiBody, ApiHeader } from '@nestjs/swagger';

/**
 * Swagger decorator for the webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive CI webhook',
      description:
        'Authenticates a webhook by its HMAC-SHA256 signature and forwards it as an event. The body must be a JSON object of at most 131072 bytes.',
    }),
    ApiHeader({
      name: 'x-hub-signature-256',
      description: 'HMAC-SHA256 of the raw body keyed with the shared secret, hex encoded',
      required: true,
      example: 'sha256=6f0c0f3e1b7c8a2d9e4f5a6b7c8d9e0f1a2b3c4d5e6f7a8b9c0d1e2f3a4b5c6d',
    }),
    ApiHeader({
      name: 'x-github-event',
      description: 'Name of the event',
      required: true,
      example: 'workflow_run',
    }),
    ApiHeader({
      name: 'x-github-delivery',
      description: 'Unique delivery id, used as the event delivery id when present',
      required: false,
      example: '72d3162e-cc78-11e3-81ab-4c9367dc0958',
    }),
    ApiBody({
      description: 'Raw webhook payload',
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          action: 'completed',
          workflow_run: { id: 30433642, conclusion: 'success' },
          repository: { full_name: 'octo-org/octo-repo' },
        },
      },
    }),
    ApiResponse({ status: 200, description: 'Webhook authenticated and dispatched' }),
    ApiResponse({
      status: 400,
      description: 'Oversize body, missing event name header or invalid JSON',
    }),
    ApiResponse({ status: 401, description: 'Missing or invalid signature' }),
    ApiResponse({
      status: 500,
      description: 'Webhook secret not configured, or the event could not be dispatched',
    }),
  );
};
