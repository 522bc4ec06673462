export interface EmailSender {
  sendVerificationEmail(email: string, code: string, link: string): Promise<boolean>;
  sendPasswordResetEmail(email: string, link: string): Promise<boolean>;
}
