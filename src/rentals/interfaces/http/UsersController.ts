import { Response } from "express";
import { z } from "zod";
import { RegisterUserUseCase } from "../../application/use-cases/RegisterUserUseCase";
import { AuthenticateUserUseCase } from "../../application/use-cases/AuthenticateUserUseCase";
import { ListUsersUseCase } from "../../application/use-cases/ListUsersUseCase";
import { GetUserUseCase } from "../../application/use-cases/GetUserUseCase";
import { DeleteUserUseCase } from "../../application/use-cases/DeleteUserUseCase";
import { UpdateUserUseCase } from "../../application/use-cases/UpdateUserUseCase";
import { TokenIssuer } from "../../application/ports/TokenIssuer";
import { userRoles } from "../../domain/entities/User";
import { UpdateUserInput } from "../../domain/repositories/UserRepository";
import { AuthenticatedRequest } from "../../../shared/http/authMiddleware";
import { AppError } from "../../../shared/http/AppError";
import { parseInput, pathParam } from "./validation";
import { toUserResponse } from "./presenters";

const registerSchema = z.object({
  name: z.string().trim().min(1),
  email: z.email(),
  password: z.string().min(6),
  role: z.enum(userRoles).default("CUSTOMER")
});

const updateSchema = z
  .object({
    name: z.string().trim().min(1),
    email: z.email(),
    password: z.string().min(6),
    role: z.enum(userRoles)
  })
  .partial()
  .strict();

const toChanges = (data: z.infer<typeof updateSchema>): UpdateUserInput => {
  const changes: UpdateUserInput = {};
  if (data.name !== undefined) changes.name = data.name;
  if (data.email !== undefined) changes.email = data.email;
  if (data.password !== undefined) changes.password = data.password;
  if (data.role !== undefined) changes.role = data.role;
  return changes;
};

// OAuth2 password forms send the email as `username`
const tokenSchema = z.object({
  email: z.email().optional(),
  username: z.email().optional(),
  password: z.string().min(1)
});

export class UsersController {
  constructor(
    private readonly registerUserUseCase: RegisterUserUseCase,
    private readonly authenticateUserUseCase: AuthenticateUserUseCase,
    private readonly listUsersUseCase: ListUsersUseCase,
    private readonly getUserUseCase: GetUserUseCase,
    private readonly updateUserUseCase: UpdateUserUseCase,
    private readonly deleteUserUseCase: DeleteUserUseCase,
    private readonly tokenIssuer: TokenIssuer
  ) {}

  register = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const input = parseInput(registerSchema, req.body);
    const user = await this.registerUserUseCase.execute(input);
    res.status(201).json(toUserResponse(user));
  };

  token = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const input = parseInput(tokenSchema, req.body);
    const email = input.email ?? input.username;
    if (!email) {
      throw new AppError("INVALID_INPUT", 400, "Invalid request: email is required");
    }
    const user = await this.authenticateUserUseCase.execute({ email, password: input.password });
    const token = this.tokenIssuer.issue(user.id, user.role);
    res.status(200).json({
      access_token: token.accessToken,
      token_type: token.tokenType,
      expires_in: token.expiresInSeconds
    });
  };

  list = async (_req: AuthenticatedRequest, res: Response): Promise<void> => {
    const users = await this.listUsersUseCase.execute();
    res.status(200).json(users.map(toUserResponse));
  };

  getById = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const user = await this.getUserUseCase.execute(pathParam(req, "id"));
    res.status(200).json(toUserResponse(user));
  };

  update = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    const data = parseInput(updateSchema, req.body);
    const user = await this.updateUserUseCase.execute(pathParam(req, "id"), toChanges(data));
    res.status(200).json(toUserResponse(user));
  };

  remove = async (req: AuthenticatedRequest, res: Response): Promise<void> => {
    await this.deleteUserUseCase.execute(pathParam(req, "id"));
    res.status(204).send();
  };
}
