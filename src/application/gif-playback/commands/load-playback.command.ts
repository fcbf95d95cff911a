import type { LoadGifPlaybackPayload } from '../dto/load-playback.dto.js';

export class LoadGifPlaybackCommand {
  public readonly payload: LoadGifPlaybackPayload;

  public constructor(payload: LoadGifPlaybackPayload) {
    this.payload = payload;
  }
}
