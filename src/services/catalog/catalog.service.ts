import { ERROR_CODES, ERROR_MESSAGES } from '../../constants/errors';
import type { LicenseRepository } from '../../repositories';
import type { Order, OrderProvider, Product, ServiceResult } from '../../types';
import { err, generateId, nowMs, ok } from '../shared';

export interface CreateProductInput {
    name: string;
    maxActivations: number;
    licenseDurationDays?: number | null;
    subscription?: boolean;
    requiresMachineId?: boolean;
}

export interface CreateOrderInput {
    productId: string;
    email: string;
    customerName?: string | null;
    provider?: OrderProvider | null;
    paymentReference?: string | null;
    transactionId?: string | null;
}

// CatalogService - products and the pending orders checkout creates.
// Orders are completed by license issuance, never here.
export class CatalogService {
    constructor(private repository: LicenseRepository) {}

    async createProduct(input: CreateProductInput): Promise<ServiceResult<Product>> {
        const product: Product = {
            id: generateId('prod'),
            name: input.name,
            maxActivations: input.maxActivations,
            licenseDurationDays: input.licenseDurationDays ?? null,
            subscription: input.subscription ?? false,
            requiresMachineId: input.requiresMachineId ?? false,
            createdAt: nowMs(),
        };
        await this.repository.createProduct(product);
        return ok(product);
    }

    async getProduct(id: string): Promise<ServiceResult<Product>> {
        const product = await this.repository.getProductById(id);
        return product ? ok(product) : err(ERROR_MESSAGES.ORDER.PRODUCT_NOT_FOUND, ERROR_CODES.PRODUCT_NOT_FOUND);
    }

    async createOrder(input: CreateOrderInput): Promise<ServiceResult<Order>> {
        const product = await this.repository.getProductById(input.productId);
        if (!product) {
            return err(ERROR_MESSAGES.ORDER.PRODUCT_NOT_FOUND, ERROR_CODES.PRODUCT_NOT_FOUND);
        }

        const order: Order = {
            id: generateId('ord'),
            productId: product.id,
            email: input.email.trim().toLowerCase(),
            customerName: input.customerName ?? null,
            status: 'pending',
            provider: input.provider ?? null,
            paymentReference: input.paymentReference ?? null,
            transactionId: input.transactionId ?? null,
            createdAt: nowMs(),
            completedAt: null,
        };
        await this.repository.createOrder(order);
        return ok(order);
    }

    async getOrder(id: string): Promise<ServiceResult<Order>> {
        const order = await this.repository.getOrderById(id);
        return order ? ok(order) : err(ERROR_MESSAGES.ORDER.NOT_FOUND, ERROR_CODES.ORDER_NOT_FOUND);
    }
}
