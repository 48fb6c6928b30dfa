import { ServerError, ServerErrorOptions } from './serverError.js';
import { STATUS_CODES } from '../../constants.js';

export class PayloadTooLargeError extends ServerError {
    constructor(message: string, options: ServerErrorOptions = {}) {
        super(message, {
            title: 'Payload Too Large',
            statusCode: STATUS_CODES.StatusPayloadTooLarge,
            ...options,
        });
    }
}
