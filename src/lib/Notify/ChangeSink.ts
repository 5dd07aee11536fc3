import { Context, Effect, Layer } from 'effect';
import type { ChangeRecord } from '../Delta/DeltaEngine.js';
import type { DeliveryError } from '../errors.js';
import type { RunStatus } from '../Persistence/RunStatus.js';

/**
 * Destination of the change set of a run.
 *
 * Delivery happens before the run's state is saved, so a change set can be
 * delivered again after a crash. Sinks must tolerate repeats.
 *
 * @group Notification
 * @public
 */
export interface ChangeSinkService {
  readonly name: string;
  readonly deliver: (
    changes: readonly ChangeRecord[],
    status: RunStatus
  ) => Effect.Effect<void, DeliveryError>;
}

export class ChangeSink extends Context.Tag('ChangeSink')<
  ChangeSink,
  ChangeSinkService
>() {
  /** Discards every change set */
  static Discard = Layer.succeed(ChangeSink, {
    name: 'discard',
    deliver: () => Effect.void,
  });

  static of = (...sinks: readonly ChangeSinkService[]) =>
    Layer.succeed(ChangeSink, combineSinks(sinks));
}

/**
 * Delivers to each sink in order, stopping at the first failure.
 */
export const combineSinks = (
  sinks: readonly ChangeSinkService[]
): ChangeSinkService => ({
  name: sinks.map((sink) => sink.name).join('+'),
  deliver: (changes, status) =>
    Effect.forEach(sinks, (sink) => sink.deliver(changes, status), {
      discard: true,
    }),
});
