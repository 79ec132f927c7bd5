import { describe, it, expect, vi } from 'vitest';
import { AudioResponder } from './audio-responder.js';
import type { CommandType } from '../peripheral/index.js';

function setup(speakResult = true) {
  const player = {
    play: vi.fn(async (_filePath: string) => {}),
    stop: vi.fn(),
  };
  const speaker = {
    speak: vi.fn(async (_commandType: CommandType, _phraseId: number) => speakResult),
  };
  const responder = new AudioResponder(
    {
      A: { asset: '/assets/a.wav', phraseId: 7 },
      B: { phraseId: 2 },
      可回收物: { phraseId: 1 },
      unmapped: {},
    },
    { ack: '/assets/ack.wav' },
    player,
    speaker,
  );
  return { player, speaker, responder };
}

describe('AudioResponder', () => {
  it('plays the configured asset and leaves the peripheral alone', async () => {
    const { player, speaker, responder } = setup();

    await expect(responder.announceCategory('A')).resolves.toBe(true);
    expect(player.play).toHaveBeenCalledTimes(1);
    expect(player.play).toHaveBeenCalledWith('/assets/a.wav');
    expect(speaker.speak).not.toHaveBeenCalled();
  });

  it('speaks the mapped phrase as an announcement when there is no asset', async () => {
    const { player, speaker, responder } = setup();

    await expect(responder.announceCategory('B')).resolves.toBe(true);
    expect(speaker.speak).toHaveBeenCalledTimes(1);
    expect(speaker.speak).toHaveBeenCalledWith(0xff, 2);
    expect(player.play).not.toHaveBeenCalled();
  });

  it('announces a recyclable result with phrase 1', async () => {
    const { speaker, responder } = setup();

    await expect(responder.announceCategory('可回收物')).resolves.toBe(true);
    expect(speaker.speak).toHaveBeenCalledTimes(1);
    expect(speaker.speak).toHaveBeenCalledWith(0xff, 1);
  });

  it('reports the peripheral refusing the command', async () => {
    const { speaker, responder } = setup(false);

    await expect(responder.announceCategory('B')).resolves.toBe(false);
    expect(speaker.speak).toHaveBeenCalledTimes(1);
  });

  it('fails without playback when neither asset nor phrase exists', async () => {
    const { player, speaker, responder } = setup();

    await expect(responder.announceCategory('unmapped')).resolves.toBe(false);
    await expect(responder.announceCategory('unknown')).resolves.toBe(false);
    expect(player.play).not.toHaveBeenCalled();
    expect(speaker.speak).not.toHaveBeenCalled();
  });

  it('does not treat inherited object keys as categories', async () => {
    const { speaker, responder } = setup();

    await expect(responder.announceCategory('toString')).resolves.toBe(false);
    expect(speaker.speak).not.toHaveBeenCalled();
  });

  it('falls back to the peripheral when the asset fails to play', async () => {
    const { player, speaker, responder } = setup();
    player.play.mockRejectedValueOnce(new Error('device busy'));

    await expect(responder.announceCategory('A')).resolves.toBe(true);
    expect(speaker.speak).toHaveBeenCalledTimes(1);
    expect(speaker.speak).toHaveBeenCalledWith(0xff, 7);
  });

  it('plays configured system events', async () => {
    const { player, speaker, responder } = setup();

    await responder.respond('ack');
    expect(player.play).toHaveBeenCalledTimes(1);
    expect(player.play).toHaveBeenCalledWith('/assets/ack.wav');
    expect(speaker.speak).not.toHaveBeenCalled();
  });

  it('ignores unconfigured system events without using the peripheral', async () => {
    const { player, speaker, responder } = setup();

    await responder.respond('classify_error');
    expect(player.play).not.toHaveBeenCalled();
    expect(speaker.speak).not.toHaveBeenCalled();
  });

  it('swallows event playback failures', async () => {
    const { player, responder } = setup();
    player.play.mockRejectedValueOnce(new Error('device busy'));

    await expect(responder.respond('ack')).resolves.toBeUndefined();
  });
});

describe('AudioResponder during shutdown', () => {
  it('does not fall back to the peripheral when playback was stopped by an abort', async () => {
    const { player, speaker, responder } = setup();
    const controller = new AbortController();
    player.play.mockImplementationOnce(async () => {
      controller.abort();
      throw new Error('ffmpeg was killed with signal SIGTERM');
    });

    await expect(responder.announceCategory('A', controller.signal)).resolves.toBe(false);
    expect(speaker.speak).not.toHaveBeenCalled();
  });
});

describe('AudioResponder.missingEvents', () => {
  it('lists the system events without an asset', () => {
    const { responder } = setup();

    expect(responder.missingEvents()).toEqual(['capture_error', 'classify_error', 'announce_error']);
  });
});
