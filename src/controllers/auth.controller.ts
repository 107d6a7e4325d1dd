import { Application, Request, Response } from 'express';

import { ILoginResponse } from '../models/auth.model.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { AuthService } from '../services/auth.service.js';
import { apiUtils } from '../utils/api.utils.js';

export class AuthController {
  authService: AuthService;

  constructor(app: Application, database: IDatabase) {
    const authService = new AuthService(database);
    this.authService = authService;

    this.mapRoutes(app);
  }

  mapRoutes(app: Application) {
    app.post(`/api/auth/signup`, this.signup.bind(this));
    app.post(`/api/auth/login`, this.login.bind(this));
  }

  async signup(req: Request, res: Response) {
    res.set('Content-Type', 'application/json');

    const loginResponse = await this.authService.signup(req.body);

    apiUtils.apiResponse<ILoginResponse>(res, 200, { data: loginResponse });
  }

  async login(req: Request, res: Response) {
    res.set('Content-Type', 'application/json');

    const loginResponse = await this.authService.attemptLogin(req.body);

    apiUtils.apiResponse<ILoginResponse>(res, 200, { data: loginResponse });
  }
}
