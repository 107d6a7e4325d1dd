import { Application, Request, Response } from 'express';

import { Persisted } from '../models/entity.interface.js';
import { SchoolScopedApiService, ISchoolScoped } from '../services/school-scoped-api.service.js';
import { apiUtils } from '../utils/api.utils.js';

/**
 * Base controller for resources owned by a school: list them for one school, create one.
 * There is no session, so the school is always named explicitly with the school_id query parameter.
 */
export abstract class ApiController<T extends ISchoolScoped & Record<string, unknown>, TCreateResponse> {
  protected app: Application;
  protected service: SchoolScopedApiService<T>;
  protected slug: string;

  /**
   * @param slug - The URL path segment for this resource (e.g., 'orders' for '/api/orders')
   * @param app - The Express application instance to register routes with
   * @param service - The school-scoped service for this entity type
   *
   * @example
   * ```
   * class OrdersController extends ApiController<IOrder, { id: string }> {
   *   constructor(app: Application, database: IDatabase) {
   *     super('orders', app, new OrderService(database));
   *   }
   *
   *   protected toCreateResponse(order: Persisted<IOrder>) {
   *     return { id: order._id };
   *   }
   * }
   * ```
   */
  protected constructor(
    slug: string,
    app: Application,
    service: SchoolScopedApiService<T>
  ) {
    this.slug = slug;
    this.app = app;
    this.service = service;

    this.mapRoutes(app);
  }

  mapRoutes(app: Application) {
    // have to bind "this" because when express calls the function we tell it to here, it won't have any context and "this" will be undefined in our functions
    app.get(`/api/${this.slug}`, this.getAllForSchool.bind(this));
    app.post(`/api/${this.slug}`, this.create.bind(this));
  }

  /**
   * Shapes the body returned after a successful create.
   */
  protected abstract toCreateResponse(entity: Persisted<T>): TCreateResponse;

  async getAllForSchool(req: Request, res: Response) {
    res.set('Content-Type', 'application/json');
    const schoolId = apiUtils.getRequiredQueryParam(req, 'school_id');

    const entities = await this.service.getAllForSchool(schoolId);
    apiUtils.apiResponse<Persisted<T>[]>(res, 200, { data: entities });
  }

  async create(req: Request, res: Response) {
    res.set('Content-Type', 'application/json');

    const entity = await this.service.create(req.body);
    apiUtils.apiResponse<TCreateResponse>(res, 200, { data: this.toCreateResponse(entity) });
  }
}
