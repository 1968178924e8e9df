export { LoginDto } from './login.dto';
export { RegisterDto } from './register.dto';
export { UserProfileDto } from './user-profile.dto';
export { SessionDto } from './session.dto';
export {
  RegisterResponseDto,
  LoginResponseDto,
  LogoutResponseDto,
} from './auth-response.dto';
