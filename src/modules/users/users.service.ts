import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../../common/errors/eduhub.errors';
import { toObjectId } from '../../common/ids/object-id';
import { COLLECTIONS } from '../schema/validators/collection-schemas';
import { CreateUserDto } from './dto/create-user.dto';
import { PROFILE_FIELDS, UpdateUserProfileDto } from './dto/update-user-profile.dto';
import { UserRepo } from './repos/user.repo';
import { UserRecord, UserRole } from './schemas/user.schema';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly repo: UserRepo) {}

  /** Stamps dateJoined and isActive; a taken email fails on the unique index. */
  async createUser(dto: CreateUserDto): Promise<string> {
    const id = await this.repo.create({
      email: dto.email,
      firstName: dto.firstName,
      lastName: dto.lastName,
      role: dto.role,
      dateJoined: new Date(),
      isActive: true,
    });
    this.logger.log(`User created: ${id.toHexString()} (${dto.role})`);
    return id.toHexString();
  }

  async findUserById(id: string): Promise<UserRecord | null> {
    return this.repo.findById(toObjectId(id));
  }

  findUserByEmail(email: string): Promise<UserRecord | null> {
    return this.repo.findOne({ email });
  }

  listUsersByRole(role: UserRole, page: { limit?: number; skip?: number } = {}): Promise<UserRecord[]> {
    return this.repo.list({ role }, page.limit ?? 50, page.skip ?? 0);
  }

  /** Returns the modified count; nothing to set means no round trip and 0. */
  async updateUserProfile(id: string, updates: UpdateUserProfileDto): Promise<number> {
    const _id = toObjectId(id);

    const set: UpdateUserProfileDto = {};
    for (const field of PROFILE_FIELDS) {
      const value = updates[field];
      if (value !== undefined) set[field] = value;
    }
    if (Object.keys(set).length === 0) return 0;

    const { matchedCount, modifiedCount } = await this.repo.updateById(_id, { $set: set });
    if (matchedCount === 0) throw new NotFoundError(COLLECTIONS.users, id);
    return modifiedCount;
  }
}
