import type { Logger } from 'pino';
import type { Event, OutputDestination } from '../domain/index.js';
import { UnknownDestinationError } from '../domain/index.js';
import type { BrokerPublisher } from './broker.js';
import type { Core } from './core.js';
import type { EventCodec } from './event-codec.js';
import { STRUCTURED_CONTENT_TYPE } from './event-codec.js';

/** What happened to one derived event. */
export type RouteResult = 'published' | 'discarded' | 'unsupported';

/**
 * Routes derived events: asks the Core where each one goes and executes
 * the publish against the engine's outbound connection.
 *
 * Errors are scoped to the single event being routed; the caller logs
 * them and keeps consuming.
 */
export class OutputRouter {
  private readonly core: Core;
  private readonly codec: EventCodec;
  /** `null` when the handler never produces output. */
  private readonly publisher: BrokerPublisher | null;
  private readonly log: Logger;

  constructor(core: Core, codec: EventCodec, publisher: BrokerPublisher | null, log: Logger) {
    this.core = core;
    this.codec = codec;
    this.publisher = publisher;
    this.log = log;
  }

  /**
   * 1. Serialise the event.
   * 2. Query the Core for its destination.
   * 3. Publish, drop or warn depending on the destination kind.
   *
   * @throws UnknownDestinationError for a kind this router does not know.
   */
  async route(event: Event): Promise<RouteResult> {
    const json = this.codec.encode(event);
    const destination = await this.core.getOutputDestination(json);

    this.log.info(
      { event_id: event.id, event_type: event.type, dest_kind: destination.kind, dest_target: destination.target },
      'Routing output event',
    );

    switch (destination.kind) {
      case 'broker':
        await this.publish(event, json, destination);
        return 'published';

      case 'discard':
        this.log.info(
          { event_id: event.id, event_type: event.type },
          'Output event discarded by routing decision',
        );
        return 'discarded';

      case 'queue':
      case 'http':
        this.log.warn(
          { event_id: event.id, event_type: event.type, dest_kind: destination.kind, dest_target: destination.target },
          'Destination kind not supported yet, discarding output event',
        );
        return 'unsupported';

      default:
        return unknownKind(destination.kind);
    }
  }

  private async publish(event: Event, json: string, destination: OutputDestination): Promise<void> {
    if (this.publisher === null) {
      throw new Error('No publisher available for broker destinations');
    }

    await this.publisher.publish({
      topic: destination.target,
      cluster: destination.cluster,
      key: event.id,
      value: json,
      headers: { 'content-type': STRUCTURED_CONTENT_TYPE },
    });

    this.log.info(
      { event_id: event.id, event_type: event.type, topic: destination.target, cluster: destination.cluster },
      'Published output event',
    );
  }
}

/**
 * Reached only when the Core and this router disagree on the set of
 * destination kinds (version skew), which must not pass silently.
 */
function unknownKind(kind: never): never {
  throw new UnknownDestinationError(String(kind));
}
