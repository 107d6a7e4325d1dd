import { IOrder } from '../models/order.model.js';
import { IPayoutRequest } from '../models/payout-request.model.js';
import { ISchool } from '../models/school.model.js';

export const TEST_SCHOOL_PASSWORD = 'test-password';

export function getTestSchool(overrides: Partial<ISchool> = {}): ISchool {
    return {
        name: 'Test School',
        email: 'admin@testschool.example',
        password: TEST_SCHOOL_PASSWORD,
        address: '1 Test Street',
        phone: '555-0100',
        ...overrides,
    };
}

export function getTestOrder(schoolId: string, overrides: Partial<IOrder> = {}): IOrder {
    return {
        school_id: schoolId,
        order_number: 'ORD-1001',
        amount: 100,
        status: 'paid',
        items: ['Shirt', 'Trousers'],
        ...overrides,
    };
}

export function getTestPayoutRequest(schoolId: string, overrides: Partial<IPayoutRequest> = {}): IPayoutRequest {
    return {
        school_id: schoolId,
        amount: 40,
        bank_name: 'Test Bank',
        account_holder: 'Test School Trust',
        account_number: '000111222333',
        ifsc: 'TEST0000001',
        status: 'pending',
        ...overrides,
    };
}
