/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building FFmpeg argument lists: inputs, stream maps,
 * codec settings and a single output.
 */

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v', 'a', 's:0'
  optional?: boolean;     // Add ? for optional
}

export interface VideoCodecOptions {
  codec: 'libx264' | 'h264_nvenc';
  preset?: string;
  crf?: number;
  bitrate?: string;
  maxrate?: string;
  bufsize?: string;
  profile?: string;
  pixFmt?: string;
}

export interface AudioCodecOptions {
  codec: 'aac';
  bitrate?: string;
}

export interface SubtitleOptions {
  codec: 'copy' | 'srt';
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private subtitleCodec: SubtitleOptions | null = null;
  private outputFile: string = '';

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  /**
   * Set video encoder and rate control
   */
  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  /**
   * Set subtitle codec (copy = keep the native format)
   */
  setSubtitleCodec(options: SubtitleOptions | 'copy'): this {
    this.subtitleCodec = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    for (const input of this.inputs) {
      args.push('-i', input);
    }

    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    if (this.videoCodec) {
      const video = this.videoCodec;
      args.push('-c:v', video.codec);
      if (video.preset) args.push('-preset', video.preset);
      if (video.crf !== undefined) args.push('-crf', video.crf.toString());
      if (video.bitrate) args.push('-b:v', video.bitrate);
      if (video.maxrate) args.push('-maxrate', video.maxrate);
      if (video.bufsize) args.push('-bufsize', video.bufsize);
      if (video.profile) args.push('-profile:v', video.profile);
      if (video.pixFmt) args.push('-pix_fmt', video.pixFmt);
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
    }

    if (this.subtitleCodec) {
      args.push('-c:s', this.subtitleCodec.codec);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}
