import type { Logger } from '../logger';

export interface NotificationSender {
  sendPasswordResetCode(phoneNumber: string, code: string): Promise<void>;
}

/** Stand-in sender until an SMS gateway is wired; never logs the code itself. */
export class LogNotificationSender implements NotificationSender {
  constructor(private readonly logger: Logger) {}

  async sendPasswordResetCode(phoneNumber: string, code: string): Promise<void> {
    this.logger.info(
      { phoneNumber, codeLength: code.length },
      'password reset code dispatched'
    );
  }
}
