/**
 * @file DeviceDescriptor.ts
 * @brief Builder for the device description announced on `heyOOCSI!`.
 *
 * @example
 * ```typescript
 * client.device('kitchen_lamp')
 *     .addProperty('owner', 'lab')
 *     .addLocation('kitchen', 51.44, 5.47)
 *     .addLight('ceiling', 'lamp_channel', 'RGBW', 'RGB', { brightness: 200 })
 *     .submit();
 * ```
 */

import { z } from 'zod';
import { DEVICE_CHANNEL } from '../protocol';
import { Logger } from '../utils/Logger';
import type { ChannelClient, EventPayload } from '../types';

export const LedTypeSchema = z.enum(['RGB', 'RGBW', 'RGBWW', 'CCT', 'DIMMABLE', 'ONOFF']);
export const SpectrumSchema = z.enum(['WHITE', 'CCT', 'RGB']);

export type LedType = z.infer<typeof LedTypeSchema>;
export type Spectrum = z.infer<typeof SpectrumSchema>;

export type ComponentType = 'sensor' | 'number' | 'binary_sensor' | 'switch' | 'light';

export type DeviceComponent = Record<string, unknown> & {
    channel_name: string;
    type: ComponentType;
};

export interface DeviceDescription {
    properties: Record<string, unknown>;
    components: Record<string, DeviceComponent>;
    location: Record<string, [latitude: number, longitude: number]>;
}

export interface SensorOptions {
    mode?: string;
    step?: number | null;
    icon?: string | null;
}

export interface LightOptions {
    state?: boolean;
    brightness?: number;
    miredMinMax?: [min: number, max: number] | null;
    icon?: string | null;
}

export class DeviceDescriptor {
    private readonly description: DeviceDescription;

    constructor(
        private readonly client: ChannelClient,
        public readonly name: string,
        private readonly logger: Logger = new Logger(`${client.getHandle()}:device`)
    ) {
        this.description = {
            properties: { device_id: client.getHandle() },
            components: {},
            location: {},
        };
        this.logger.info(`Created device ${name}.`);
    }

    addProperty(property: string, value: unknown): this {
        this.description.properties[property] = value;
        this.logger.info(`Added ${property} to the properties list of device ${this.name}.`);
        return this;
    }

    addLocation(locationName: string, latitude: number = 0, longitude: number = 0): this {
        this.description.location[locationName] = [latitude, longitude];
        this.logger.info(`Added ${locationName} to the locations list of device ${this.name}.`);
        return this;
    }

    addSensor(
        sensorName: string,
        channel: string,
        sensorType: string,
        unit: string,
        defaultValue: number,
        options: SensorOptions = {}
    ): this {
        return this.addComponent(sensorName, {
            channel_name: channel,
            type: 'sensor',
            sensor_type: sensorType,
            unit,
            value: defaultValue,
            mode: options.mode ?? 'auto',
            step: options.step ?? null,
            icon: options.icon ?? null,
        });
    }

    addNumber(
        numberName: string,
        channel: string,
        minMax: [min: number, max: number],
        unit: string,
        defaultValue: number,
        icon: string | null = null
    ): this {
        return this.addComponent(numberName, {
            channel_name: channel,
            type: 'number',
            min_max: minMax,
            unit,
            value: defaultValue,
            icon,
        });
    }

    addBinarySensor(
        sensorName: string,
        channel: string,
        sensorType: string,
        defaultState: boolean = false,
        icon: string | null = null
    ): this {
        return this.addComponent(sensorName, {
            channel_name: channel,
            type: 'binary_sensor',
            sensor_type: sensorType,
            state: defaultState,
            icon,
        });
    }

    addSwitch(switchName: string, channel: string, defaultState: boolean = false, icon: string | null = null): this {
        return this.addComponent(switchName, {
            channel_name: channel,
            type: 'switch',
            state: defaultState,
            icon,
        });
    }

    /**
     * Unknown LED types and spectra are reported but still recorded as given.
     */
    addLight(lightName: string, channel: string, ledType: string, spectrum: string, options: LightOptions = {}): this {
        if (!LedTypeSchema.safeParse(ledType).success) {
            this.logger.error(`error, ${lightName} ledtype does not exist.`);
        } else if (!SpectrumSchema.safeParse(spectrum).success) {
            this.logger.error(`error, ${lightName} spectrum does not exist.`);
        }

        return this.addComponent(lightName, {
            channel_name: channel,
            type: 'light',
            ledType,
            spectrum,
            min_max: options.miredMinMax ?? null,
            state: options.state ?? false,
            brightness: options.brightness ?? 0,
            icon: options.icon ?? null,
        });
    }

    /** `{ [name]: description }`, the payload sent by `submit()`. */
    toJSON(): EventPayload {
        return { [this.name]: this.description };
    }

    /** Publish the description once on `heyOOCSI!`. */
    submit(): void {
        this.client.publish(DEVICE_CHANNEL, this.toJSON());
        this.logger.info(`Sent heyOOCSI! message for device ${this.name}.`);
    }

    sayHi(): void {
        this.submit();
    }

    private addComponent(componentName: string, component: DeviceComponent): this {
        this.description.components[componentName] = component;
        this.logger.info(`Added ${componentName} to the components list of device ${this.name}.`);
        return this;
    }
}
