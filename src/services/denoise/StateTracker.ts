import type { AudioFormat, InputUnit } from '../../models/AudioUnit';
import { ConfigurationViolationError } from '../../errors/DenoiseErrors';

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationViolationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Session mute state and audio format.
 * The format is fixed by the first start and every input unit must match it.
 */
export class StateTracker {
  private _format: AudioFormat | null = null;
  private _muted = false;

  get format(): AudioFormat | null {
    return this._format;
  }

  get muted(): boolean {
    return this._muted;
  }

  setMuted(muted: boolean): void {
    this._muted = muted;
  }

  configure(sampleRate: number, numChannels: number): AudioFormat {
    assertPositiveInteger('sampleRate', sampleRate);
    assertPositiveInteger('numChannels', numChannels);

    if (this._format) {
      if (this._format.sampleRate !== sampleRate || this._format.numChannels !== numChannels) {
        throw new ConfigurationViolationError(
          `Session format is fixed at ${this.describe(this._format)}, cannot change to ${this.describe({ sampleRate, numChannels })}`
        );
      }
      return this._format;
    }

    this._format = { sampleRate, numChannels };
    return this._format;
  }

  /**
   * @throws ConfigurationViolationError when the unit does not match the session format
   */
  assertMatches(unit: InputUnit): AudioFormat {
    if (!this._format) {
      throw new ConfigurationViolationError('Session format has not been configured');
    }
    if (unit.sampleRate !== this._format.sampleRate || unit.numChannels !== this._format.numChannels) {
      throw new ConfigurationViolationError(
        `Input audio is ${this.describe(unit)}, session expects ${this.describe(this._format)}`
      );
    }
    return this._format;
  }

  private describe(format: AudioFormat): string {
    return `${format.sampleRate} Hz / ${format.numChannels} ch`;
  }
}
