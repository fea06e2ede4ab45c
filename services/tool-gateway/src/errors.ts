export type ErrorKind =
    | 'UnauthenticatedRole'
    | 'RoleMismatch'
    | 'UnknownTool'
    | 'PermissionDenied'
    | 'InvalidArguments'
    | 'TokenNotFound'
    | 'TokenExpired'
    | 'RequestMismatch'
    | 'ActionPending'
    | 'BackendUnavailable'
    | 'BackendTimeout'
    | 'BackendAmbiguous'
    | 'BackendRejected'
    | 'Internal';

export type RetryHint = 'retry_later' | 'request_new_preview' | 'recheck_status' | 'fix_request' | 'do_not_retry';

/**
 * What the caller can assume about the backend after a failure:
 * `not_executed` nothing happened, `unknown` something may have happened,
 * `rejected` the request was refused by policy or by the backend.
 */
export type FailureOutcome = 'not_executed' | 'unknown' | 'rejected';

interface KindProfile {
    httpStatus: number;
    retryHint: RetryHint;
    outcome: FailureOutcome;
    fallbackAction: string;
}

const NEW_PREVIEW = 'Call the tool again without a confirmation_token to get a fresh preview.';

const PROFILES: Record<ErrorKind, KindProfile> = {
    UnauthenticatedRole: {
        httpStatus: 401,
        retryHint: 'fix_request',
        outcome: 'not_executed',
        fallbackAction: 'Send the caller role (associate, merch or support) in the role header or as arguments.role.'
    },
    RoleMismatch: {
        httpStatus: 400,
        retryHint: 'fix_request',
        outcome: 'not_executed',
        fallbackAction: 'Send the same role in the header and in arguments.role, or only one of them.'
    },
    UnknownTool: {
        httpStatus: 404,
        retryHint: 'fix_request',
        outcome: 'not_executed',
        fallbackAction: 'List the available tools with GET /tools.'
    },
    PermissionDenied: {
        httpStatus: 403,
        retryHint: 'do_not_retry',
        outcome: 'rejected',
        fallbackAction: 'Ask a user with an allowed role to run this tool.'
    },
    InvalidArguments: {
        httpStatus: 422,
        retryHint: 'fix_request',
        outcome: 'not_executed',
        fallbackAction: 'Correct the arguments to match the input schema listed by GET /tools.'
    },
    TokenNotFound: {
        httpStatus: 404,
        retryHint: 'request_new_preview',
        outcome: 'not_executed',
        fallbackAction: NEW_PREVIEW
    },
    TokenExpired: {
        httpStatus: 410,
        retryHint: 'request_new_preview',
        outcome: 'not_executed',
        fallbackAction: NEW_PREVIEW
    },
    RequestMismatch: {
        httpStatus: 409,
        retryHint: 'fix_request',
        outcome: 'not_executed',
        fallbackAction: 'Confirm with exactly the arguments that were previewed, or request a new preview.'
    },
    ActionPending: {
        httpStatus: 409,
        retryHint: 'recheck_status',
        outcome: 'unknown',
        fallbackAction: 'Check the ledger entry for this action before resending.'
    },
    BackendUnavailable: {
        httpStatus: 503,
        retryHint: 'retry_later',
        outcome: 'not_executed',
        fallbackAction: 'Retry the same request shortly; nothing was changed.'
    },
    BackendTimeout: {
        httpStatus: 504,
        retryHint: 'retry_later',
        outcome: 'not_executed',
        fallbackAction: 'Retry the same request shortly.'
    },
    BackendAmbiguous: {
        httpStatus: 502,
        retryHint: 'recheck_status',
        outcome: 'unknown',
        fallbackAction: 'Check the ledger entry for this action before resending.'
    },
    BackendRejected: {
        httpStatus: 409,
        retryHint: 'do_not_retry',
        outcome: 'rejected',
        fallbackAction: 'Review the backend message and adjust the request.'
    },
    Internal: {
        httpStatus: 500,
        retryHint: 'retry_later',
        outcome: 'not_executed',
        fallbackAction: 'Retry later or contact support.'
    }
};

export interface GatewayErrorOptions {
    fallbackAction?: string;
    details?: Record<string, unknown>;
}

export class GatewayError extends Error {
    readonly kind: ErrorKind;
    readonly retryHint: RetryHint;
    readonly outcome: FailureOutcome;
    readonly fallbackAction: string;
    readonly details?: Record<string, unknown>;

    constructor(kind: ErrorKind, message: string, options: GatewayErrorOptions = {}) {
        super(message);
        this.name = 'GatewayError';
        this.kind = kind;
        this.retryHint = PROFILES[kind].retryHint;
        this.outcome = PROFILES[kind].outcome;
        this.fallbackAction = options.fallbackAction || PROFILES[kind].fallbackAction;
        this.details = options.details;
    }

    withFallback(fallbackAction: string): GatewayError {
        return new GatewayError(this.kind, this.message, { fallbackAction, details: this.details });
    }
}

export const httpStatusFor = (kind: ErrorKind): number => PROFILES[kind].httpStatus;

export const describeError = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
};

/** Wire form of a failure, shared by tool results and the HTTP error bodies. */
export interface ErrorBody {
    error_kind: ErrorKind;
    message: string;
    retry_hint: RetryHint;
    outcome: FailureOutcome;
    fallback_action: string;
    details?: Record<string, unknown>;
}

export const toErrorBody = (error: GatewayError): ErrorBody => ({
    error_kind: error.kind,
    message: error.message,
    retry_hint: error.retryHint,
    outcome: error.outcome,
    fallback_action: error.fallbackAction,
    ...(error.details ? { details: error.details } : {})
});
