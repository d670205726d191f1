import { UserRole } from '../schemas/user.schema';

export interface CreateUserDto {
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
}
