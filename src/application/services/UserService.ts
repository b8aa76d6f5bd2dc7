import type { UserProfile } from '../../domain/entities/UserProfile.js';
import { ConsentUpdateSchema } from '../dto/UserDTO.js';
import { InvalidRequestError, NotFoundError } from '../errors/RecommendationErrors.js';
import type { StoragePort } from '../ports/StoragePort.js';

export class UserService {
  constructor(private readonly storage: StoragePort) {}

  /** Takes effect on the next recommendation request; nothing is cached. */
  async updateConsent(userId: string, input: unknown): Promise<UserProfile> {
    const parsed = ConsentUpdateSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidRequestError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    const user = await this.storage.setConsent(userId, parsed.data.consent);
    if (!user) {
      throw new NotFoundError(userId);
    }

    console.log(`🔐 Consent ${user.consentGranted ? 'granted' : 'revoked'}`, { userId });

    return user;
  }
}
