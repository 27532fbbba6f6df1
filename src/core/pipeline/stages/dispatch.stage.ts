import {
  PipelineStage,
  WebhookContext,
  StageResult,
  DispatcherUnavailableError,
} from '../types';
import { ProcessingState } from '../../domain/enums';
import { EventDispatcherProvider } from '../../interfaces';

/**
 * Stage 5: Dispatch
 * Hands the event to whichever dispatcher is active right now.
 * Failures are not retried; they fail the request.
 */
export class DispatchStage implements PipelineStage {
  name = 'dispatch';
  state = ProcessingState.DISPATCHING;

  constructor(private readonly dispatcher: EventDispatcherProvider) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const { event } = context;
    if (!event) {
      throw new Error('Dispatch requires a decoded event');
    }

    const dispatcher = this.dispatcher.get();
    if (!dispatcher) {
      throw new DispatcherUnavailableError(event.type);
    }

    await dispatcher.postEvent(event);

    return {
      context,
      shouldContinue: false, // Last stage
    };
  }
}
