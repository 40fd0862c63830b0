export type { SecretName, SecretProvider } from './SecretProvider';
export type { SummarizationClient } from './SummarizationClient';
export type { NoteClient } from './NoteClient';
export type {
  FailureNotification,
  NotificationClient,
  SuccessNotification,
} from './NotificationClient';
