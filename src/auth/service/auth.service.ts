import {
  BadRequestException,
  HttpException,
  Injectable,
  UnauthorizedException,
} from "@nestjs/common";
import { AuditAction, RequestOrigin } from "@audit/core/domain";
import { AuditRepositoryPort } from "@audit/core/ports/out/audit.repository.port";
import { IssuedToken } from "@auth/core/domain";
import { LoginDto, RegisterDto } from "@auth/core/dtos";
import { AuthUseCase } from "@auth/core/ports/in/auth.use-case";
import { PasswordHasherPort } from "@auth/core/ports/out/password-hasher.port";
import { TokenPort } from "@auth/core/ports/out/token.port";
import { DuplicateResourceError } from "@database/core/domain";
import { DatabasePort } from "@database/core/ports/out/database.port";
import { UserRole } from "@logging/core/value-objects";
import { LoggingService } from "@logging/service/logging.service";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";
import { TaskInstrumentation } from "@observability/service/task-instrumentation.service";
import { User } from "@users/core/domain";
import { UsersRepositoryPort } from "@users/core/ports/out/users.repository.port";

const DUPLICATE_ACCOUNT = "Email or username already registered";
const BAD_CREDENTIALS = "Incorrect email or password";

@Injectable()
export class AuthService extends AuthUseCase {
  constructor(
    private readonly users: UsersRepositoryPort,
    private readonly audit: AuditRepositoryPort,
    private readonly database: DatabasePort,
    private readonly passwordHasher: PasswordHasherPort,
    private readonly tokens: TokenPort,
    private readonly metrics: MetricsUseCase,
    private readonly instrumentation: TaskInstrumentation,
    private readonly loggingService: LoggingService,
  ) {
    super();
  }

  async register(input: RegisterDto, origin: RequestOrigin): Promise<User> {
    this.loggingService.info("User registration attempt", {
      email: input.email,
      username: input.username,
    });

    return this.instrumentation.run("user_registration", async () => {
      try {
        const taken = await this.users.existsByEmailOrUsername(
          input.email,
          input.username,
        );
        if (taken) {
          throw new BadRequestException(DUPLICATE_ACCOUNT);
        }

        const hashedPassword = await this.passwordHasher.hash(input.password);
        const user = await this.database.transaction(async (session) => {
          const created = await this.users.create(
            {
              email: input.email,
              username: input.username,
              hashedPassword,
              fullName: input.full_name ?? null,
            },
            session,
          );
          await this.audit.record(
            {
              userId: created.id,
              action: AuditAction.USER_REGISTRATION,
              resourceType: "user",
              resourceId: String(created.id),
              ...origin,
            },
            session,
          );
          return created;
        });

        this.metrics.recordDomainEvent("user_registration", {});
        this.loggingService.info("User registered successfully", {
          user_id: user.id,
          email: user.email,
        });
        return user;
      } catch (error) {
        // a concurrent registration can still hit the unique constraints
        if (error instanceof DuplicateResourceError) {
          throw new BadRequestException(DUPLICATE_ACCOUNT);
        }
        if (!(error instanceof HttpException)) {
          this.loggingService.error("User registration failed", {
            email: input.email,
            error: error instanceof Error ? error.message : String(error),
          });
          this.metrics.recordDomainEvent("error", {
            error_type: "registration_error",
            service: "user_service",
          });
        }
        throw error;
      }
    });
  }

  async login(input: LoginDto, origin: RequestOrigin): Promise<IssuedToken> {
    this.loggingService.info("Login attempt", { email: input.email });

    return this.instrumentation.run("user_login", async () => {
      try {
        const user = await this.users.findByEmail(input.email);
        if (
          user === null ||
          !user.isActive ||
          !(await this.passwordHasher.verify(input.password, user.hashedPassword))
        ) {
          this.metrics.recordDomainEvent("login_attempt", { status: "failure" });
          this.loggingService.warn("Login failed", { email: input.email });
          throw new UnauthorizedException(BAD_CREDENTIALS);
        }

        await this.database.transaction(async (session) => {
          await this.users.updateLastLogin(user.id, new Date(), session);
          await this.audit.record(
            {
              userId: user.id,
              action: AuditAction.USER_LOGIN,
              resourceType: "user",
              resourceId: String(user.id),
              ...origin,
            },
            session,
          );
        });

        const issued = this.tokens.issue(String(user.id));
        this.metrics.recordDomainEvent("login_attempt", { status: "success" });
        this.loggingService.addUserContext({
          id: String(user.id),
          role: user.isSuperuser ? UserRole.SUPERUSER : UserRole.USER,
        });
        this.loggingService.info("User logged in successfully", {
          user_id: user.id,
          email: user.email,
        });
        return issued;
      } catch (error) {
        if (!(error instanceof HttpException)) {
          this.loggingService.error("Login failed with error", {
            email: input.email,
            error: error instanceof Error ? error.message : String(error),
          });
          this.metrics.recordDomainEvent("error", {
            error_type: "login_error",
            service: "auth_service",
          });
        }
        throw error;
      }
    });
  }
}
