import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for user login.
 *
 * Only checks that both fields are present; AuthService verifies the
 * credentials.
 */
export class LoginDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
