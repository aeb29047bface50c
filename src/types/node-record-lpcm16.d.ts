declare module "node-record-lpcm16" {
  import { Readable } from "stream";

  interface RecordOptions {
    sampleRate?: number;
    channels?: number;
    audioType?: string;
    recorder?: string;
    silence?: string;
    thresholdStart?: number;
    thresholdEnd?: number;
    endOnSilence?: boolean;
  }

  interface Recording {
    stream(): Readable;
    stop(): void;
  }

  export function record(options?: RecordOptions): Recording;
}
