/**
 * Canonical names of the event types the remote service emits.
 *
 * Handler registries may contain other names too; this list is used for
 * the default handlers and for diagnostics.
 */
export const KNOWN_EVENT_TYPES = [
  'PongEvent',

  'LegalCaseCreatedEvent',
  'LegalCaseStatusChangedEvent',
  'LegalCaseUpdatedEvent',
  'LegalCaseDeletedEvent',
  'LegalCaseReadyEvent',
  'NotebookUpdatedEvent',

  'SourceFileCreatedEvent',
  'SourceFileUpdatedEvent',
  'SourceFileReadyEvent',
  'SourceFileFailedEvent',

  'AnnotationCreatedEvent',
  'AnnotationUpdatedEvent',
  'AnnotationDeletedEvent',

  'ExportCreatedEvent',
  'ExportSharedEvent',
  'ExportViewedEvent',

  'ThreadCreatedEvent',
  'ThreadClosedEvent',
] as const;

export type EventTypeName = (typeof KNOWN_EVENT_TYPES)[number];

const KNOWN = new Set<string>(KNOWN_EVENT_TYPES);

export function isKnownEventType(name: string): name is EventTypeName {
  return KNOWN.has(name);
}
