import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

/** Presence checks only; AuthService decides whether the pair is valid. */
export class LoginDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
