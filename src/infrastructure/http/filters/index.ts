export { ApplicationErrorFilter } from './application-error.filter';
