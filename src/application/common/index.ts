export { Either, Left, Right, left, right } from './either';
export { publishSavedEvents } from './publish-saved-events';
