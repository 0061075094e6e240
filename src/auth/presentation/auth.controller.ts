import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
} from "@nestjs/common";
import { Origin } from "@audit/presentation/origin.decorator";
import { RequestOrigin } from "@audit/core/domain";
import {
  LoginDto,
  RegisterDto,
  TokenResponse,
  toTokenResponse,
} from "@auth/core/dtos";
import { AuthUseCase } from "@auth/core/ports/in/auth.use-case";
import { CurrentUser } from "@auth/presentation/current-user.decorator";
import { JwtAuthGuard } from "@auth/presentation/jwt-auth.guard";
import { User } from "@users/core/domain";
import { toUserResponse, UserResponse } from "@users/core/dtos";

@Controller("api/v1/auth")
export class AuthController {
  constructor(private readonly auth: AuthUseCase) {}

  @Post("register")
  @HttpCode(HttpStatus.CREATED)
  async register(
    @Body() dto: RegisterDto,
    @Origin() origin: RequestOrigin,
  ): Promise<UserResponse> {
    const user = await this.auth.register(dto, origin);
    return toUserResponse(user);
  }

  @Post("login")
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() dto: LoginDto,
    @Origin() origin: RequestOrigin,
  ): Promise<TokenResponse> {
    return toTokenResponse(await this.auth.login(dto, origin));
  }

  @Get("me")
  @UseGuards(JwtAuthGuard)
  me(@CurrentUser() user: User): UserResponse {
    return toUserResponse(user);
  }
}
