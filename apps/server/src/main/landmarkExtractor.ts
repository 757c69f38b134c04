import type { Landmark } from "@facecue/gesture-core";
import type { DecodedFrame } from "./frameDecoder";

/**
 * Turns one decoded camera frame into face-mesh landmarks (normalised image
 * coordinates, 468/478 points). Resolves to null when no face is found.
 */
export interface LandmarkExtractor {
  readonly name: string;
  isAvailable(): boolean;
  extract(frame: DecodedFrame): Promise<Landmark[] | null>;
  close?(): Promise<void>;
}

/**
 * Default extractor when no face-mesh backend is wired in. Clients are
 * expected to send landmarks computed on their side instead of images.
 */
export class UnavailableLandmarkExtractor implements LandmarkExtractor {
  readonly name = "none";

  isAvailable(): boolean {
    return false;
  }

  extract(): Promise<Landmark[] | null> {
    return Promise.reject(
      new Error(`Landmark extractor "${this.name}" is not available`),
    );
  }
}
