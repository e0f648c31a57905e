/**
 * Email rendered for a processed receipt. Lives only for the send call.
 */
export type NotificationMessage = {
  subject: string;
  textBody: string;
  htmlBody: string;
};
