import Ajv, { ErrorObject, Schema, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

const ajv = new Ajv({ allErrors: true, useDefaults: true, allowUnionTypes: true });
addFormats(ajv);

export type Sensitivity = 'low' | 'high';

export const compileSchema = <T>(schema: Schema): ValidateFunction<T> => ajv.compile<T>(schema);

export const formatErrors = (errors: ErrorObject[] | null | undefined): string => {
    if (!errors || errors.length === 0) {
        return 'invalid value';
    }
    return errors
        .map((error) => `${error.instancePath || '/'} ${error.message || 'is invalid'}`)
        .join('; ');
};

export const redactSensitiveData = (data: unknown, sensitivity: Sensitivity): unknown => {
    if (sensitivity === 'high' && typeof data === 'object' && data !== null) {
        // Keys only: free-text fields may carry customer details
        return { redacted: true, original_keys: Object.keys(data) };
    }
    return data;
};
