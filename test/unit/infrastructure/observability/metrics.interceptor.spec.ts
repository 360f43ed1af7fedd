import { BadRequestException } from '@nestjs/common';
import { MetricsInterceptor } from '@infrastructure/observability/metrics';
import { OrderNotFoundError } from '@application/errors';

describe('MetricsInterceptor', () => {
  describe('normalizePath', () => {
    it('should collapse generated ids into one label per route', () => {
      const path = '/api/v1/orders/ord_3f2a9c1e-77b0-4d1e-9a51-0c2b8e6f1d44/cancel';

      expect(MetricsInterceptor.normalizePath(path)).toBe('/api/v1/orders/:ordId/cancel');
    });

    it('should drop the query string', () => {
      expect(MetricsInterceptor.normalizePath('/api/v1/menu/items?categoryId=cat_1')).toBe(
        '/api/v1/menu/items',
      );
    });

    it('should leave route templates untouched', () => {
      expect(MetricsInterceptor.normalizePath('/api/v1/orders/:id')).toBe('/api/v1/orders/:id');
    });
  });

  describe('statusOf', () => {
    it('should use the status of an application error', () => {
      expect(MetricsInterceptor.statusOf(new OrderNotFoundError('ord_1'))).toBe(404);
    });

    it('should use the status of an HTTP exception', () => {
      expect(MetricsInterceptor.statusOf(new BadRequestException('bad'))).toBe(400);
    });

    it('should fall back to 500', () => {
      expect(MetricsInterceptor.statusOf(new Error('boom'))).toBe(500);
    });
  });
});
