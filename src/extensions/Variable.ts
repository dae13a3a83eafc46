/**
 * @file Variable.ts
 * @brief A numeric value bound to one key of one channel.
 *
 * Local `set()` calls and incoming events pass through the same
 * constraints: clamping to `min`/`max`, and with a `sigma`, pulling outliers
 * towards the current mean. With `smooth(n)` the value is the mean of the
 * last `n` accepted values.
 *
 * @example
 * ```typescript
 * const temperature = client.variable('sensors', 'temperature').min(-20).max(60).smooth(5);
 * temperature.set(21.5);
 * temperature.get();
 * ```
 */

import { ConfigurationError } from '../errors';
import type { ChannelClient, EventPayload, EventReceiver } from '../types';

export class Variable implements EventReceiver {
    private value: number | undefined;
    private values: number[] = [];
    private windowLength = 0;
    private minValue: number | undefined;
    private maxValue: number | undefined;
    private sigma: number | undefined;

    constructor(
        private readonly client: ChannelClient,
        public readonly channel: string,
        public readonly key: string
    ) {
        client.subscribe(channel, this);
    }

    /** Current value: the window mean when smoothing, else the last accepted value. */
    get(): number | undefined {
        if (this.windowLength > 0 && this.values.length > 0) {
            return this.values.reduce((sum, v) => sum + v, 0) / this.values.length;
        }
        return this.value;
    }

    /** Store the constrained value and publish it on the channel. */
    set(value: number): void {
        const constrained = this.constrain(value);
        this.store(constrained);
        this.client.publish(this.channel, { [this.key]: constrained });
    }

    invoke(_sender: string, _recipient: string, event: EventPayload): void {
        const incoming = event[this.key];
        if (typeof incoming !== 'number' || Number.isNaN(incoming)) return;
        this.store(this.constrain(incoming));
    }

    min(minValue: number): this {
        this.minValue = minValue;
        if (this.value !== undefined && this.value < minValue) {
            this.value = minValue;
        }
        return this;
    }

    max(maxValue: number): this {
        this.maxValue = maxValue;
        if (this.value !== undefined && this.value > maxValue) {
            this.value = maxValue;
        }
        return this;
    }

    /**
     * Average over the last `windowLength` values (0 turns smoothing off).
     * With `sigma`, values further than `sigma` from the mean are pulled in.
     */
    smooth(windowLength: number, sigma?: number): this {
        if (!Number.isInteger(windowLength) || windowLength < 0) {
            throw new ConfigurationError(`windowLength must be a non-negative integer, got ${windowLength}`);
        }
        this.windowLength = windowLength;
        this.sigma = sigma;
        return this;
    }

    private constrain(value: number): number {
        if (this.minValue !== undefined && value < this.minValue) return this.minValue;
        if (this.maxValue !== undefined && value > this.maxValue) return this.maxValue;

        if (this.sigma !== undefined) {
            const mean = this.get();
            if (mean !== undefined && Math.abs(mean - value) > this.sigma) {
                const step = this.sigma / Math.max(this.values.length, 1);
                return mean - value > 0 ? mean - step : mean + step;
            }
        }
        return value;
    }

    private store(value: number): void {
        if (this.windowLength > 0) {
            this.values.push(value);
            if (this.values.length > this.windowLength) {
                this.values = this.values.slice(-this.windowLength);
            }
        } else {
            this.value = value;
        }
    }
}
