export { ChangeLog, CHANGE_LOG_FILE_NAME, type ChangeLogOptions } from './change-log.js';
