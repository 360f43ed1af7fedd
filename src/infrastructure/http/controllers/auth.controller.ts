import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiConflictResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { Either } from '@application/common';
import { AuthResultDto, UserOutputDto } from '@application/dtos';
import { ApplicationError } from '@application/errors';
import { IAuthPort } from '@application/ports/inbound';
import { TokenPayload } from '@application/ports/outbound';
import { AppLoggerService } from '@infrastructure/observability/logging';
import { MetricsService } from '@infrastructure/observability/metrics';
import { CurrentUser } from '../decorators';
import { LoginRequestDto, RegisterRequestDto } from '../dtos/request';
import { JwtAuthGuard } from '../guards';
import { ApiResponse as Envelope, ok, unwrap } from '../responses';

/**
 * Account registration and sign-in.
 */
@ApiTags('Auth')
@Controller('api/v1/auth')
export class AuthController {
  private readonly logger = new Logger(AuthController.name);

  constructor(
    @Inject('AuthUseCase')
    private readonly auth: IAuthPort,
    private readonly appLogger: AppLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  @Post('register')
  @ApiOperation({
    summary: 'Register a customer account',
    description: 'Creates the account and its customer profile, then returns an access token.',
  })
  @ApiResponse({ status: 201, description: 'Account created' })
  @ApiConflictResponse({ description: 'Email already registered' })
  async register(@Body() body: RegisterRequestDto): Promise<Envelope<AuthResultDto>> {
    const result = await this.auth.register(body);
    this.audit('register', body.email, result);
    return ok(unwrap(result), 'Account created');
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Sign in with email and password' })
  @ApiResponse({ status: 200, description: 'Signed in' })
  @ApiUnauthorizedResponse({ description: 'Invalid email or password' })
  async login(@Body() body: LoginRequestDto): Promise<Envelope<AuthResultDto>> {
    const result = await this.auth.login(body);
    this.audit('login', body.email, result);
    return ok(unwrap(result));
  }

  @Get('me')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Get the signed-in user' })
  @ApiUnauthorizedResponse({ description: 'Missing or invalid token' })
  async me(@CurrentUser() user: TokenPayload): Promise<Envelope<UserOutputDto>> {
    this.logger.debug(`Loading current user ${user.sub}`);
    return ok(unwrap(await this.auth.getCurrentUser(user.sub)));
  }

  private audit(
    action: 'register' | 'login',
    email: string,
    result: Either<ApplicationError, AuthResultDto>,
  ): void {
    this.metrics.recordAuthAttempt(action, result.isRight());
    this.appLogger.logAuthEvent(
      result.isRight()
        ? { action, success: true, email, userId: result.value.user.id }
        : { action, success: false, email, reason: result.value.code },
    );
  }
}
