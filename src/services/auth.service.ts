import { ILoginResponse, LoginRequestSpec } from '../models/auth.model.js';
import { ISchool } from '../models/school.model.js';
import { Persisted } from '../models/entity.interface.js';
import { IDatabase } from '../databases/models/database.interface.js';
import { entityUtils } from '../utils/entity.utils.js';
import { AuthError, ConflictError, DuplicateKeyError } from '../errors/index.js';
import { SchoolService } from './school.service.js';

export const EMAIL_TAKEN_MESSAGE = 'Email already registered';

/**
 * Signup and login for schools. There are no sessions or tokens: callers keep the returned
 * school_id and send it with every later request.
 */
export class AuthService {
    private schoolService: SchoolService;

    constructor(database: IDatabase) {
        this.schoolService = new SchoolService(database);
    }

    async signup(body: unknown): Promise<ILoginResponse> {
        const school = this.schoolService.prepareEntity(body);

        const existing = await this.schoolService.getByEmail(school.email);
        if (existing) {
            throw new ConflictError(EMAIL_TAKEN_MESSAGE);
        }

        let created: Persisted<ISchool>;
        try {
            created = await this.schoolService.insertEntity(school);
        }
        catch (err: unknown) {
            // a concurrent signup won the race for the unique email index
            if (err instanceof DuplicateKeyError) {
                throw new ConflictError(EMAIL_TAKEN_MESSAGE);
            }
            throw err;
        }

        return this.toLoginResponse(created);
    }

    async attemptLogin(body: unknown): Promise<ILoginResponse> {
        const { email, password } = entityUtils.parse(LoginRequestSpec, body, 'AuthService.attemptLogin');

        const school = await this.schoolService.getByCredentials(email, password);
        if (!school) {
            throw new AuthError('Invalid credentials');
        }

        return this.toLoginResponse(school);
    }

    private toLoginResponse(school: Persisted<ISchool>): ILoginResponse {
        return {
            school_id: school._id,
            name: school.name,
            email: school.email,
        };
    }
}
