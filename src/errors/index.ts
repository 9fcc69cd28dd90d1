export {
  ConfigServerError,
  IoError,
  ParseError,
  DecodeError,
  GitOperationError,
  NotFoundError,
  BadRequestError,
  UnauthorizedError,
  ConfigurationError,
  isConfigServerError,
} from './ConfigServerError.js';
export type { ErrorKind, GitStage } from './ConfigServerError.js';
