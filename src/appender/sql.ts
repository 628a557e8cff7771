/**
 * Fixed statement shapes for the three log event tables
 */

export const EVENT_ID_COLUMN = 'event_id';

export const INSERT_EVENT_SQL =
  'INSERT INTO logging_event (' +
  'timestmp, formatted_message, logger_name, level_string, thread_name, ' +
  'reference_flag, caller_filename, caller_class, caller_method, caller_line) ' +
  'VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)';

export const INSERT_PROPERTY_SQL =
  'INSERT INTO logging_event_property (event_id, mapped_key, mapped_value) VALUES (?, ?, ?)';

export const INSERT_EXCEPTION_SQL =
  'INSERT INTO logging_event_exception (event_id, i, trace_line) VALUES (?, ?, ?)';

/** 1-based parameter positions of the parent insert */
export const EVENT_COLUMNS = {
  timestamp: 1,
  formattedMessage: 2,
  loggerName: 3,
  level: 4,
  threadName: 5,
  referenceFlag: 6,
  callerFilename: 7,
  callerClass: 8,
  callerMethod: 9,
  callerLine: 10,
} as const;
