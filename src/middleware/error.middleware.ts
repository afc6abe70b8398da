import { handleError, notFoundHandler } from '../utils/errorHandler';

export { handleError as errorMiddleware, notFoundHandler };
