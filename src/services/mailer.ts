/**
 * Outbound mail
 *
 * The API only ever sends one message: the e-mail verification link.
 */

export interface VerificationMail {
  to: string;
  username: string;
  link: string;
}

export interface Mailer {
  sendVerificationEmail(mail: VerificationMail): Promise<void>;
}

/**
 * Mailer that writes messages to the console instead of delivering them.
 *
 * The link embeds a credential, so it is printed only in development.
 */
export class LogMailer implements Mailer {
  constructor(private readonly printLinks: boolean = process.env.NODE_ENV === 'development') {}

  async sendVerificationEmail(mail: VerificationMail): Promise<void> {
    if (this.printLinks) {
      console.log(`[Mailer] Verification mail for ${mail.username} <${mail.to}>: ${mail.link}`);
      return;
    }
    console.log(`[Mailer] Verification mail queued for ${mail.to}`);
  }
}
