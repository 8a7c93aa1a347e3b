import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiTooManyRequestsResponse,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { AuthService } from './auth.service';
import { AuthEmailLoginDto } from './dto/auth-email-login.dto';
import { AuthRegisterDto } from './dto/auth-register.dto';
import { LoginResponseDto } from './dto/login-response.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { extractIdentityFromRequest } from '../utils/actor-extractor.util';

@ApiTags('Auth')
@Controller({
  path: 'auth',
  version: '1',
})
export class AuthController {
  constructor(private readonly service: AuthService) {}

  @Post('email/register')
  @ApiOperation({
    summary: 'Register',
    description: 'Create an account with email and password.',
  })
  @ApiCreatedResponse({ type: UserResponseDto })
  @ApiConflictResponse({ description: 'Email already registered' })
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 5, ttl: 60000 } })
  register(
    @Request() request: ExpressRequest,
    @Body() createUserDto: AuthRegisterDto,
  ): Promise<UserResponseDto> {
    return this.service.register(createUserDto, {
      ipAddress: request.ip ?? null,
      userAgent: request.get('user-agent') ?? null,
    });
  }

  @Post('email/login')
  @ApiOperation({
    summary: 'Email/Password Login',
    description:
      'Returns a JWT access token and the user profile. Rate limited to 5 requests per minute.',
  })
  @ApiOkResponse({ type: LoginResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid email or password' })
  @ApiTooManyRequestsResponse({ description: 'Rate limit exceeded' })
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 5, ttl: 60000 } })
  public login(@Body() loginDto: AuthEmailLoginDto): Promise<LoginResponseDto> {
    return this.service.validateLogin(loginDto);
  }

  @ApiBearerAuth()
  @Get('me')
  @UseGuards(AuthGuard('jwt'))
  @ApiOperation({ summary: 'Get Current User' })
  @ApiOkResponse({ type: UserResponseDto })
  @ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
  @HttpCode(HttpStatus.OK)
  public me(@Request() request: ExpressRequest): Promise<UserResponseDto> {
    return this.service.me(extractIdentityFromRequest(request));
  }

  @ApiBearerAuth()
  @Delete('me')
  @UseGuards(AuthGuard('jwt'))
  @ApiOperation({
    summary: 'Deactivate Current User',
    description:
      'Marks the account inactive. Existing tokens stop working; documents and history are kept.',
  })
  @ApiNoContentResponse({ description: 'Account deactivated' })
  @ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
  @HttpCode(HttpStatus.NO_CONTENT)
  public async delete(@Request() request: ExpressRequest): Promise<void> {
    await this.service.deactivate(extractIdentityFromRequest(request), {
      ipAddress: request.ip ?? null,
      userAgent: request.get('user-agent') ?? null,
    });
  }
}
