export { AccountService, toPublicProfile, type AccountServiceOptions } from './account-service.js';
export { SubscriptionService, type SubscriptionResult } from './subscription-service.js';
export { VideoService, type PublishVideoInput } from './video-service.js';
export { LogMailer, type Mailer, type VerificationMail } from './mailer.js';
export {
  LocalMediaStorage,
  type LocalMediaStorageOptions,
  type MediaStorage,
} from './media-storage.js';
