export type VoicePipelineErrorCode =
  | "capture_error"
  | "transcription_timeout"
  | "transcription_empty"
  | "generation_timeout"
  | "generation_failure"
  | "synthesis_failure"
  | "playback_failure";

export class VoicePipelineError extends Error {
  readonly code: VoicePipelineErrorCode;

  constructor(code: VoicePipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CaptureError extends VoicePipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("capture_error", message, options);
  }
}

export class TranscriptionTimeout extends VoicePipelineError {
  constructor(timeoutMs: number) {
    super("transcription_timeout", `transcription timed out after ${timeoutMs}ms`);
  }
}

export class TranscriptionEmpty extends VoicePipelineError {
  constructor() {
    super("transcription_empty", "transcription returned no text");
  }
}

export class GenerationTimeout extends VoicePipelineError {
  constructor(timeoutMs: number) {
    super("generation_timeout", `generation timed out after ${timeoutMs}ms`);
  }
}

export class GenerationFailure extends VoicePipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("generation_failure", message, options);
  }
}

export class SynthesisFailure extends VoicePipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("synthesis_failure", message, options);
  }
}

export class PlaybackFailure extends VoicePipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("playback_failure", message, options);
  }
}
