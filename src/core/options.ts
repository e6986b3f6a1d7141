/**
 * Planner and explain options with typed access and change notification
 */

import { createLogger } from '../common/logger.js';
import { PlanErrorKind, planError } from '../common/errors.js';

const log = createLogger('options');

/** Every planner option is a switch */
export type OptionValue = boolean;

export interface OptionDefinition {
	defaultValue: OptionValue;
	aliases?: string[];
	description?: string;
	onChange?: OptionChangeListener;
}

export interface OptionChangeEvent {
	key: string;
	oldValue: OptionValue;
	newValue: OptionValue;
}

export type OptionChangeListener = (event: OptionChangeEvent) => void;

/** Plan-joins: choose a delta query for joins that carry no implementation descriptor */
export const PLAN_JOINS = 'plan_joins';
/** Render `demand = (...)` under joins that carry a demand set */
export const EXPLAIN_DEMAND = 'explain_demand';
/** Render `| | types = (...)` after every operator */
export const EXPLAIN_TYPES = 'explain_types';

/**
 * Options accepted by `buildPlan` and `explainPlan` as a plain record.
 */
export interface PlannerConfig {
	readonly plan_joins?: boolean;
	readonly explain_demand?: boolean;
	readonly explain_types?: boolean;
}

/**
 * Registered boolean options with aliases, value conversion and change listeners
 */
export class PlannerOptionsManager {
	private options = new Map<string, OptionValue>();
	private definitions = new Map<string, OptionDefinition>();
	private aliases = new Map<string, string>(); // alias -> canonical key

	constructor(config?: PlannerConfig) {
		this.registerOption(PLAN_JOINS, {
			defaultValue: true,
			aliases: ['planjoins'],
			description: 'Choose a delta-query strategy for joins without an explicit implementation',
		});
		this.registerOption(EXPLAIN_DEMAND, {
			defaultValue: true,
			description: 'Include join demand annotations in explain output',
		});
		this.registerOption(EXPLAIN_TYPES, {
			defaultValue: false,
			aliases: ['typed'],
			description: 'Include column types after every operator in explain output',
		});

		if (config) {
			this.applyConfig(config);
		}
	}

	/**
	 * Register an option with its definition
	 */
	registerOption(key: string, definition: OptionDefinition): void {
		if (this.definitions.has(key)) {
			planError(PlanErrorKind.Internal, `Option ${key} is already registered`, { option: key });
		}

		this.definitions.set(key, definition);
		this.options.set(key, definition.defaultValue);

		// Register aliases
		if (definition.aliases) {
			for (const alias of definition.aliases) {
				if (this.aliases.has(alias.toLowerCase())) {
					planError(PlanErrorKind.Internal, `Option alias ${alias} is already registered`, { option: alias });
				}
				this.aliases.set(alias.toLowerCase(), key);
			}
		}

		log('Registered option %s (default: %j)', key, definition.defaultValue);
	}

	/** Apply every present key of a config record */
	applyConfig(config: PlannerConfig): void {
		for (const [key, value] of Object.entries(config)) {
			if (value !== undefined) {
				this.setOption(key, value);
			}
		}
	}

	/**
	 * Set an option value and notify listeners
	 */
	setOption(key: string, value: unknown): void {
		const canonicalKey = this.requireKey(key);
		const convertedValue = this.convertToBoolean(value, key);
		const oldValue = this.getOption(canonicalKey);

		if (oldValue === convertedValue) {
			return; // No change
		}

		this.options.set(canonicalKey, convertedValue);
		log('Option %s changed: %j → %j', canonicalKey, oldValue, convertedValue);

		// Notify listener if registered
		this.notifyListener(canonicalKey, oldValue, convertedValue);
	}

	/**
	 * Get an option value
	 */
	getOption(key: string): OptionValue {
		const canonicalKey = this.requireKey(key);
		const value = this.options.get(canonicalKey);
		if (value === undefined) {
			return planError(PlanErrorKind.Internal, `Option ${key} has no value`, { option: key });
		}
		return value;
	}

	/**
	 * Get all current options
	 */
	getAllOptions(): Record<string, OptionValue> {
		const result: Record<string, OptionValue> = {};
		for (const [key, value] of this.options) {
			result[key] = value;
		}
		return result;
	}

	/** Register a listener on an existing option */
	onChange(key: string, listener: OptionChangeListener): void {
		const canonicalKey = this.requireKey(key);
		const definition = this.definitionFor(canonicalKey);
		this.definitions.set(canonicalKey, { ...definition, onChange: listener });
	}

	private resolveKey(key: string): string | undefined {
		const lowerKey = key.toLowerCase();

		// Check if it's an alias
		const aliasTarget = this.aliases.get(lowerKey);
		if (aliasTarget) {
			return aliasTarget;
		}

		// Check if it's a direct key
		for (const registeredKey of this.definitions.keys()) {
			if (registeredKey.toLowerCase() === lowerKey) {
				return registeredKey;
			}
		}

		return undefined;
	}

	private requireKey(key: string): string {
		return this.resolveKey(key) ?? planError(PlanErrorKind.InvalidArgument, `Unknown option: ${key}`, { option: key });
	}

	private definitionFor(key: string): OptionDefinition {
		const definition = this.definitions.get(this.requireKey(key));
		if (!definition) {
			return planError(PlanErrorKind.InvalidArgument, `Unknown option: ${key}`, { option: key });
		}
		return definition;
	}

	private convertToBoolean(value: unknown, key: string): boolean {
		if (typeof value === 'boolean') {
			return value;
		}
		if (typeof value === 'string') {
			const lower = value.toLowerCase();
			if (lower === 'true' || lower === '1' || lower === 'on' || lower === 'yes') {
				return true;
			}
			if (lower === 'false' || lower === '0' || lower === 'off' || lower === 'no') {
				return false;
			}
		}
		if (typeof value === 'number') {
			return value !== 0;
		}
		return planError(PlanErrorKind.InvalidArgument, `Invalid boolean value for option ${key}: ${String(value)}`, { option: key });
	}

	private notifyListener(key: string, oldValue: OptionValue, newValue: OptionValue): void {
		const definition = this.definitions.get(key);
		if (definition?.onChange) {
			const event: OptionChangeEvent = { key, oldValue, newValue };
			try {
				definition.onChange(event);
			} catch (error) {
				log('Error in option change listener for %s: %s', key, error);
			}
		}
	}
}

/** Accept either a manager or a config record */
export function resolveOptions(options?: PlannerOptionsManager | PlannerConfig): PlannerOptionsManager {
	return options instanceof PlannerOptionsManager ? options : new PlannerOptionsManager(options);
}
