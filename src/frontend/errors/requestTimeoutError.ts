import { ServerError, ServerErrorOptions } from './serverError.js';
import { STATUS_CODES } from '../../constants.js';

export class RequestTimeoutError extends ServerError {
    constructor(message: string, options: ServerErrorOptions = {}) {
        super(message, {
            title: 'Request Timeout Error',
            statusCode: STATUS_CODES.StatusRequestTimeout,
            ...options,
        });
    }
}
