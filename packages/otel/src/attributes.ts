/**
 * Attribute keys for error telemetry
 *
 * Keys follow the OpenTelemetry `error.*` namespace where one exists.
 *
 * @see https://opentelemetry.io/docs/specs/semconv/attributes-registry/error/
 * @module attributes
 */

// Metric labels on `error_total`
export const METRIC_ERROR_TOTAL = "error_total";
export const LABEL_CODE = "code";
export const LABEL_CATEGORY = "category";

// Log record / span event attributes
export const ATTR_ERROR_TYPE = "error.type";
export const ATTR_ERROR_CODE = "error.code";
export const ATTR_ERROR_CATEGORY = "error.category";
export const ATTR_ERROR_MESSAGE = "error.message";
export const ATTR_ERROR_RETRY_AFTER = "error.retry_after_seconds";
export const ATTR_ERROR_REDACTABLE = "error.redactable";
export const ATTR_ERROR_METADATA_LENGTH = "error.metadata.length";
export const ATTR_WWW_AUTHENTICATE = "http.response.header.www_authenticate";
export const ATTR_TRACE_ID = "trace_id";
export const ATTR_SPAN_ID = "span_id";
export const ATTR_LOGGER_NAME = "logger.name";

/** `error.type` value for every record produced by the error runtime */
export const ERROR_TYPE_APP_ERROR = "AppError";
