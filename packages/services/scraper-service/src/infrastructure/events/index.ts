export { JobEventPublisher } from './JobEventPublisher';
export { JobCleanupSubscriber } from './JobCleanupSubscriber';
