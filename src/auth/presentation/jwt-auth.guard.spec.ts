import {
  BadRequestException,
  ExecutionContext,
  ForbiddenException,
  UnauthorizedException,
} from "@nestjs/common";
import { ExecutionContextHost } from "@nestjs/core/helpers/execution-context-host";
import { Test, TestingModule } from "@nestjs/testing";
import { AuthenticatedRequest } from "@auth/core/domain";
import { TokenPort } from "@auth/core/ports/out/token.port";
import { LoggingService } from "@logging/service/logging.service";
import { User } from "@users/core/domain";
import { UsersRepositoryPort } from "@users/core/ports/out/users.repository.port";
import { JwtAuthGuard } from "./jwt-auth.guard";

describe("JwtAuthGuard", () => {
  let guard: JwtAuthGuard;

  const user: User = {
    id: 3,
    email: "grace@example.com",
    username: "grace",
    hashedPassword: "hashed",
    fullName: null,
    isActive: true,
    isSuperuser: true,
    createdAt: new Date("2026-01-01T00:00:00.000Z"),
    updatedAt: new Date("2026-01-01T00:00:00.000Z"),
    lastLogin: null,
  };

  const mockTokens = { issue: jest.fn(), verify: jest.fn() };
  const mockUsers = { findById: jest.fn() };
  const mockLoggingService = { addUserContext: jest.fn() };

  function contextFor(authorization?: string): {
    context: ExecutionContext;
    request: Partial<AuthenticatedRequest>;
  } {
    const request: Partial<AuthenticatedRequest> = {
      headers: authorization === undefined ? {} : { authorization },
    };
    return { context: new ExecutionContextHost([request, {}]), request };
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        JwtAuthGuard,
        { provide: TokenPort, useValue: mockTokens },
        { provide: UsersRepositoryPort, useValue: mockUsers },
        { provide: LoggingService, useValue: mockLoggingService },
      ],
    }).compile();

    guard = module.get<JwtAuthGuard>(JwtAuthGuard);
  });

  it("should reject a request without bearer credentials with 403", async () => {
    await expect(guard.canActivate(contextFor().context)).rejects.toThrow(
      new ForbiddenException("Not authenticated"),
    );
    await expect(
      guard.canActivate(contextFor("Basic abc").context),
    ).rejects.toBeInstanceOf(ForbiddenException);
  });

  it("should reject an invalid token with 401", async () => {
    mockTokens.verify.mockReturnValue(null);

    await expect(
      guard.canActivate(contextFor("Bearer nonsense").context),
    ).rejects.toThrow(
      new UnauthorizedException("Invalid authentication credentials"),
    );
  });

  it("should reject a token for a missing user with 401", async () => {
    mockTokens.verify.mockReturnValue({ sub: "99" });
    mockUsers.findById.mockResolvedValue(null);

    await expect(
      guard.canActivate(contextFor("Bearer token").context),
    ).rejects.toThrow(new UnauthorizedException("User not found"));
  });

  it("should reject an inactive user with 400", async () => {
    mockTokens.verify.mockReturnValue({ sub: "3" });
    mockUsers.findById.mockResolvedValue({ ...user, isActive: false });

    await expect(
      guard.canActivate(contextFor("Bearer token").context),
    ).rejects.toThrow(new BadRequestException("Inactive user"));
  });

  it("should attach the user to the request and the log context", async () => {
    mockTokens.verify.mockReturnValue({ sub: "3" });
    mockUsers.findById.mockResolvedValue(user);
    const { context, request } = contextFor("Bearer token");

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(mockTokens.verify).toHaveBeenCalledWith("token");
    expect(mockUsers.findById).toHaveBeenCalledWith(3);
    expect(request.authUser).toBe(user);
    expect(mockLoggingService.addUserContext).toHaveBeenCalledWith({
      id: "3",
      role: "superuser",
    });
  });
});
