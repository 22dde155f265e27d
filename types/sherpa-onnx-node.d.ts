// sherpa-onnx-node ships no type declarations; this covers the parts used here.
declare module "sherpa-onnx-node" {
  export interface Waveform {
    sampleRate: number;
    samples: Float32Array;
  }

  export interface OfflineRecognizerConfig {
    featConfig?: { sampleRate?: number; featureDim?: number };
    modelConfig: {
      whisper?: { encoder: string; decoder: string; language?: string; task?: string };
      tokens: string;
      numThreads?: number;
      provider?: string;
      debug?: number;
    };
  }

  export class OfflineStream {
    acceptWaveform(waveform: Waveform): void;
  }

  export class OfflineRecognizer {
    constructor(config: OfflineRecognizerConfig);
    createStream(): OfflineStream;
    decode(stream: OfflineStream): void;
    getResult(stream: OfflineStream): { text: string };
  }

  export interface VadConfig {
    sileroVad: {
      model: string;
      threshold?: number;
      minSpeechDuration?: number;
      minSilenceDuration?: number;
      windowSize?: number;
    };
    sampleRate: number;
    numThreads?: number;
    debug?: boolean;
  }

  export interface SpeechSegment {
    start: number;
    samples: Float32Array;
  }

  export class Vad {
    constructor(config: VadConfig, bufferSizeInSeconds: number);
    acceptWaveform(samples: Float32Array): void;
    isEmpty(): boolean;
    isDetected(): boolean;
    front(): SpeechSegment;
    pop(): void;
    flush(): void;
    reset(): void;
    clear(): void;
  }

  const sherpa: {
    OfflineRecognizer: typeof OfflineRecognizer;
    Vad: typeof Vad;
  };
  export default sherpa;
}
