import { FatalError } from '../utils/errors.js';

/**
 * A long-running loop that stops when its signal aborts
 */
export interface PipelineLoop {
  run(signal: AbortSignal): Promise<void>;
}

/**
 * Run the detection producer and the trigger consumer side by side under
 * one controller.
 *
 * Either loop failing aborts the other, and the first failure is rethrown.
 * The producer returning while the signal is still live means the audio
 * stream ended underneath it, which is fatal.
 */
export async function runPipeline(
  producer: PipelineLoop,
  consumer: PipelineLoop,
  controller: AbortController,
): Promise<void> {
  const { signal } = controller;

  const producing = producer.run(signal).then(() => {
    if (!signal.aborted) {
      throw new FatalError('Audio stream ended unexpectedly', 'AUDIO_SOURCE_FAILED');
    }
  });
  const consuming = consumer.run(signal);

  const guard = (loop: Promise<void>) =>
    loop.catch((error: unknown) => {
      controller.abort();
      throw error;
    });

  await Promise.all([guard(producing), guard(consuming)]);
}
