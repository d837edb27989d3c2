import type { SampleRun, Waveform } from "./types.js";

export class WaveformAssembler {
  private readonly runs: SampleRun[] = [];
  private samples = 0;

  append(run: SampleRun): void {
    this.runs.push(run);
    this.samples += run.length;
  }

  get runCount(): number {
    return this.runs.length;
  }

  get sampleCount(): number {
    return this.samples;
  }

  assemble(): Waveform {
    const waveform = new Float32Array(this.samples);
    let offset = 0;
    for (const run of this.runs) {
      waveform.set(run, offset);
      offset += run.length;
    }
    return waveform;
  }
}
