import _ from 'lodash';
import { KindGuard, Static, TObject, TSchema } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { ValueError } from '@sinclair/typebox/errors';
import { Value } from '@sinclair/typebox/value';

import { IError, ValidationError } from '../errors/index.js';
import { IModelSpec } from '../models/model-spec.interface.js';
import { initializeTypeBox } from '../validation/typebox-formats.js';

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

const NUMERIC_STRING_PATTERN = /^\s*-?(\d+\.?\d*|\.\d+)\s*$/;

// "42.5" -> 42.5 for number and integer fields; every other value is left for validation to judge
function convertNumericStrings(schema: TObject, value: unknown): unknown {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		return value;
	}

	return Object.fromEntries(Object.entries(value).map(([key, item]) => {
		const property: TSchema | undefined = schema.properties[key];
		const isNumberField = property !== undefined && (KindGuard.IsNumber(property) || KindGuard.IsInteger(property));
		if (isNumberField && typeof item === 'string' && NUMERIC_STRING_PATTERN.test(item)) {
			return [key, Number(item)];
		}
		return [key, item];
	}));
}

function getModelSpec<S extends TObject>(schema: S): IModelSpec<Static<S>> {
	initializeTypeBox();
	const validator = TypeCompiler.Compile(schema);

	return {
		decode: (value: unknown) => Value.Clean(schema, convertNumericStrings(schema, Value.Default(schema, Value.Clone(value)))),
		isValid: (value: unknown): value is Static<S> => validator.Check(value),
		errors: (value: unknown) => [...validator.Errors(value)],
	};
}

/**
 * @returns null if the value is valid, otherwise every error TypeBox reports for it
 */
function validate<T>(modelSpec: IModelSpec<T>, value: unknown): ValueError[] | null {
	if (modelSpec.isValid(value)) {
		return null;
	}
	const errors = modelSpec.errors(value);
	return errors.length > 0 ? errors : null;
}

// "/items/0" -> "items.0", the root path maps to no field at all
function toFieldErrors(errors: ValueError[]): IError[] {
	const fieldErrors = errors.map((error) => {
		const field = error.path.replace(/^\//, '').split('/').join('.');
		return field ? { field, message: error.message } : { message: error.message };
	});
	return _.uniqBy(fieldErrors, (error) => error.field ?? '');
}

/**
 * Decodes an incoming value with the model spec and returns it typed, or throws a ValidationError.
 */
function parse<T>(modelSpec: IModelSpec<T>, value: unknown, context: string): T {
	const decoded = modelSpec.decode(value);
	if (modelSpec.isValid(decoded)) {
		return decoded;
	}
	throw new ValidationError(toFieldErrors(modelSpec.errors(decoded)), `Validation failed in ${context}`);
}

function isValidObjectId(id: unknown): id is string {
	return typeof id === 'string' && OBJECT_ID_PATTERN.test(id);
}

export const entityUtils = {
	getModelSpec,
	validate,
	toFieldErrors,
	parse,
	isValidObjectId,
};
