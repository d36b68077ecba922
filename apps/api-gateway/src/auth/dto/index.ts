export { LoginDto } from './login.dto';
export { RegisterDto } from './register.dto';
export { UpdateOptionsDto } from './update-options.dto';
export { AuthResponseDto } from './auth-response.dto';
export { UserProfileDto } from './user-profile.dto';
