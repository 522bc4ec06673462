import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';

/**
 * Argon2id hashing. The argon2 binding runs on the libuv thread pool, so
 * hashing never blocks the event loop.
 */
@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);

  async hashPassword(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        memoryCost: 4096, // 4MB
        timeCost: 3,
        parallelism: 1,
      });
    } catch (error) {
      this.logger.error('Password hashing failed', error instanceof Error ? error.stack : error);
      throw new Error('Password hashing failed');
    }
  }

  /**
   * A hash that argon2 cannot parse verifies as false
   */
  async verifyPassword(password: string, hash: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      this.logger.warn(
        `Password verification failed on a malformed hash: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
