import { describe, it, expect, beforeEach } from 'vitest';

import { AuthService, EMAIL_TAKEN_MESSAGE } from '../auth.service.js';
import { AuthError, ConflictError, ValidationError } from '../../errors/index.js';
import { SCHOOL_COLLECTION } from '../../models/school.model.js';
import { TestMemoryDatabase } from '../../__tests__/test-memory-database.js';
import { getTestSchool, TEST_SCHOOL_PASSWORD } from '../../__tests__/test-objects.js';

describe('AuthService', () => {
  let database: TestMemoryDatabase;
  let authService: AuthService;

  beforeEach(() => {
    database = new TestMemoryDatabase();
    authService = new AuthService(database);
  });

  describe('signup', () => {
    it('should create a school and return its id, name and email', async () => {
      const school = getTestSchool();

      const response = await authService.signup(school);

      expect(response.name).toBe(school.name);
      expect(response.email).toBe(school.email);
      const stored = database.getCollection(SCHOOL_COLLECTION);
      expect(stored).toHaveLength(1);
      expect(stored[0]._id).toBe(response.school_id);
    });

    it('should reject an email that is already registered', async () => {
      await authService.signup(getTestSchool());

      await expect(authService.signup(getTestSchool({ name: 'Another School' })))
        .rejects.toThrow(new ConflictError(EMAIL_TAKEN_MESSAGE));
      expect(database.getCollection(SCHOOL_COLLECTION)).toHaveLength(1);
    });

    it('should treat emails that differ only in case as different schools', async () => {
      await authService.signup(getTestSchool({ email: 'admin@testschool.example' }));

      const response = await authService.signup(getTestSchool({ email: 'Admin@TestSchool.example' }));

      expect(response.email).toBe('Admin@TestSchool.example');
    });

    it('should report a duplicate key from the store as an email conflict', async () => {
      const racingDatabase = new TestMemoryDatabase();
      const racingService = new AuthService(racingDatabase);
      // the school lookup misses, but the unique index still rejects the insert
      racingDatabase.findOne = async () => null;
      racingDatabase.seed(SCHOOL_COLLECTION, [getTestSchool()]);

      await expect(racingService.signup(getTestSchool())).rejects.toBeInstanceOf(ConflictError);
    });

    it('should validate before touching the store', async () => {
      await expect(authService.signup({ name: 'School', email: 'bad', password: 'short' }))
        .rejects.toBeInstanceOf(ValidationError);
      expect(database.getCollection(SCHOOL_COLLECTION)).toHaveLength(0);
    });
  });

  describe('attemptLogin', () => {
    it('should log in with the email and password used at signup', async () => {
      const signup = await authService.signup(getTestSchool());

      const login = await authService.attemptLogin({ email: getTestSchool().email, password: TEST_SCHOOL_PASSWORD });

      expect(login).toEqual(signup);
    });

    it('should reject a wrong password', async () => {
      await authService.signup(getTestSchool());

      await expect(authService.attemptLogin({ email: getTestSchool().email, password: 'wrong-password' }))
        .rejects.toThrow(new AuthError('Invalid credentials'));
    });

    it('should reject an unknown email', async () => {
      await expect(authService.attemptLogin({ email: 'nobody@testschool.example', password: TEST_SCHOOL_PASSWORD }))
        .rejects.toBeInstanceOf(AuthError);
    });

    it('should require both email and password', async () => {
      await expect(authService.attemptLogin({ email: getTestSchool().email }))
        .rejects.toBeInstanceOf(ValidationError);
    });
  });
});
