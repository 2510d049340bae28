import type { Logger } from 'pino';
import type { AgentEvent, EventHandler } from '../domain/index.js';
import { KNOWN_EVENT_TYPES } from '../domain/index.js';
import {
  legalCaseReadyEventSchema,
  pongEventSchema,
  sourceFileFailedEventSchema,
} from './event-schemas.js';
import { typedHandler } from './typed-handler.js';

/**
 * Handlers for every known event type that only log what arrived.
 *
 * Integrations replace individual entries with their own handlers:
 *
 *   createHandlerRegistry({ ...createDefaultHandlers(log), SourceFileReadyEvent: onReady })
 */
export function createDefaultHandlers(log: Logger): Record<string, EventHandler> {
  const logEvent: EventHandler = (event: AgentEvent) => {
    log.info(
      { type: event.type, eventId: event.id, tenantId: event['tenantId'] },
      `${event.type} received`,
    );
  };

  const handlers: Record<string, EventHandler> = {};
  for (const type of KNOWN_EVENT_TYPES) {
    handlers[type] = logEvent;
  }

  handlers['PongEvent'] = typedHandler(pongEventSchema, (event) => {
    log.info(
      { eventId: event.id, tenantId: event.tenantId, message: event.message },
      'PongEvent received',
    );
  });

  handlers['LegalCaseReadyEvent'] = typedHandler(legalCaseReadyEventSchema, (event) => {
    log.info(
      { eventId: event.id, legalCaseId: event.legalCaseId, legalCaseUrl: event.legalCaseUrl },
      'Legal case ready',
    );
  });

  handlers['SourceFileFailedEvent'] = typedHandler(sourceFileFailedEventSchema, (event) => {
    log.warn(
      { eventId: event.id, sourceFileId: event.sourceFileId, legalCaseId: event.legalCaseId },
      'Source file processing failed',
    );
  });

  return handlers;
}
