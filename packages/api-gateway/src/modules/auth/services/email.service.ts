import { Injectable, Logger } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { ConfigService } from '../../../config/services/config.service';
import { maskEmail } from '../../../common/utils/mask-email.util';
import { EmailSender } from '../interfaces/email-sender.interface';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

@Injectable()
export class EmailService implements EmailSender {
  private readonly logger = new Logger(EmailService.name);
  private readonly transporter: nodemailer.Transporter;
  private readonly fromEmail: string;
  private readonly codeTtlMinutes: number;
  private readonly captureOnly: boolean;

  constructor(configService: ConfigService) {
    const { email, auth } = configService.settings;
    this.fromEmail = email.from;
    this.codeTtlMinutes = auth.verificationCodeTtlMinutes;
    this.captureOnly = email.transport === 'json';

    if (this.captureOnly) {
      // Local development and tests: messages are rendered to JSON and logged, never delivered
      this.transporter = nodemailer.createTransport({ jsonTransport: true });
      this.logger.log('Using JSON email transport; messages are not delivered');
    } else {
      const { host, port, secure, user, password } = email.smtp;
      this.transporter = nodemailer.createTransport({
        host,
        port,
        secure,
        ...(user && password ? { auth: { user, pass: password } } : {}),
      });
      this.logger.log(`Using SMTP email transport via ${host}:${port}`);
    }
  }

  async sendEmail(to: string, subject: string, html: string, text?: string): Promise<boolean> {
    try {
      const info = await this.transporter.sendMail({
        from: this.fromEmail,
        to,
        subject,
        text: text || html.replace(/<[^>]*>/g, ''),
        html,
      });

      this.logger.log(
        `Email "${subject}" ${this.captureOnly ? 'captured' : 'sent'} for ${maskEmail(to)}: ${info.messageId}`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to send email to ${maskEmail(to)}`,
        error instanceof Error ? error.stack : error,
      );
      return false;
    }
  }

  async sendVerificationEmail(email: string, code: string, link: string): Promise<boolean> {
    const subject = 'Verify your Careport email address';
    const safeLink = escapeHtml(link);

    const html = `
      <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
        <h2>Welcome to Careport!</h2>
        <p>Your verification code is:</p>
        <p style="font-size: 28px; letter-spacing: 6px; font-weight: bold;">${escapeHtml(code)}</p>
        <p>Or confirm your address with the button below:</p>
        <div style="text-align: center; margin: 30px 0;">
          <a href="${safeLink}" style="background-color: #2E7D6B; color: white; padding: 12px 20px; text-decoration: none; border-radius: 4px; font-weight: bold;">
            Verify Email Address
          </a>
        </div>
        <p>${safeLink}</p>
        <p>The code and link expire in ${this.codeTtlMinutes} minutes.</p>
        <p>If you didn't create an account, you can safely ignore this email.</p>
      </div>
    `;

    return this.sendEmail(email, subject, html);
  }

  async sendPasswordResetEmail(email: string, link: string): Promise<boolean> {
    const subject = 'Reset your Careport password';
    const safeLink = escapeHtml(link);

    const html = `
      <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
        <h2>Password Reset Request</h2>
        <p>We received a request to reset your password. Click the button below to choose a new one:</p>
        <div style="text-align: center; margin: 30px 0;">
          <a href="${safeLink}" style="background-color: #4285F4; color: white; padding: 12px 20px; text-decoration: none; border-radius: 4px; font-weight: bold;">
            Reset Password
          </a>
        </div>
        <p>${safeLink}</p>
        <p>This link expires in ${this.codeTtlMinutes} minutes. Resetting your password signs you out everywhere.</p>
        <p>If you didn't request a password reset, you can ignore this email.</p>
      </div>
    `;

    return this.sendEmail(email, subject, html);
  }
}
