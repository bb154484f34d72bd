import { buildHarness, Harness, JANE } from "./harness";
import { InvalidInputError, NotFoundError } from "../errors/httpError";
import { ConsistencyError, PersistenceError } from "../errors/persistenceError";

describe("OrderService", () => {
  let h: Harness;

  beforeEach(async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date("2025-01-01T09:00:00Z"));
    h = await buildHarness();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("create", () => {
    test("prices items from the catalog and assigns orderId 1 to the first order", async () => {
      const order = await h.orders.create({
        customer: JANE,
        items: [
          { productId: 1, quantity: 2 },
          { productId: 3, quantity: 1 },
        ],
      });

      expect(order.total).toBe(22.97);
      expect(order.orderId).toBe(1);
      expect(order.status).toBe("pending");
      expect(order.customer).toEqual(JANE);
      expect(order.createdAt.toISOString()).toBe("2025-01-01T09:00:00.000Z");
      expect(await h.orderRepo.findById(order.id)).toEqual(order);
    });

    test("sequential orders get consecutive ids", async () => {
      const ids: number[] = [];
      for (let i = 0; i < 4; i++) {
        const order = await h.orders.create({ customer: JANE, items: [{ productId: 2, quantity: 1 }] });
        ids.push(order.orderId);
      }
      expect(ids).toEqual([1, 2, 3, 4]);
    });

    test("concurrent orders get distinct ids", async () => {
      const created = await Promise.all(
        [1, 2, 3].map(() => h.orders.create({ customer: JANE, items: [{ productId: 2, quantity: 1 }] }))
      );
      expect(created.map(o => o.orderId).sort()).toEqual([1, 2, 3]);
    });

    test("an unknown product contributes nothing to the total", async () => {
      const order = await h.orders.create({
        customer: JANE,
        items: [
          { productId: 4, quantity: 1 },
          { productId: 404, quantity: 3 },
        ],
      });
      expect(order.total).toBe(24.99);
      expect(order.items).toEqual([
        { productId: 4, quantity: 1 },
        { productId: 404, quantity: 3 },
      ]);
    });

    test("the total uses the price at creation time", async () => {
      const first = await h.orders.create({ customer: JANE, items: [{ productId: 3, quantity: 2 }] });
      const croissant = await h.productRepo.findByProductId(3);
      await h.productRepo.update(croissant?.id ?? "", { price: 10 });

      expect((await h.orders.get(first.id)).total).toBe(9.98);
      const second = await h.orders.create({ customer: JANE, items: [{ productId: 3, quantity: 2 }] });
      expect(second.total).toBe(20);
    });

    test("rejects an empty item list", async () => {
      await expect(h.orders.create({ customer: JANE, items: [] })).rejects.toBeInstanceOf(InvalidInputError);
      expect(await h.orderRepo.list()).toEqual([]);
    });

    test("a total that overflows is invalid input and stores nothing", async () => {
      await expect(
        h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1e308 }] })
      ).rejects.toThrow("Order total is out of range");
      expect(await h.orderRepo.list()).toEqual([]);
    });

    test("a failed price lookup stores nothing", async () => {
      jest
        .spyOn(h.productRepo, "findByProductId")
        .mockRejectedValueOnce(new PersistenceError("products.findByProductId", new Error("timeout")));
      await expect(
        h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] })
      ).rejects.toBeInstanceOf(PersistenceError);
      expect(await h.orderRepo.list()).toEqual([]);
    });
  });

  describe("reads", () => {
    test("list is newest first", async () => {
      const first = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest.setSystemTime(new Date("2025-01-01T10:00:00Z"));
      const second = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });

      expect((await h.orders.list()).map(o => o.id)).toEqual([second.id, first.id]);
    });

    test("get rejects a malformed identity as invalid input", async () => {
      await expect(h.orders.get("42")).rejects.toBeInstanceOf(InvalidInputError);
    });

    test("get reports an unknown identity as not found", async () => {
      await expect(h.orders.get("0123456789abcdef01234567")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("markDelivered", () => {
    test("moves the order into the delivered collection", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest.setSystemTime(new Date("2025-01-01T12:30:00Z"));

      const receipt = await h.orders.markDelivered(order.id);

      expect(receipt.orderId).toBe(1);
      expect(receipt.deliveredAt.toISOString()).toBe("2025-01-01T12:30:00.000Z");
      expect(await h.orders.list()).toEqual([]);
      const delivered = await h.orders.listDelivered();
      expect(delivered).toHaveLength(1);
      expect(delivered[0]).toEqual({ ...order, status: "delivered", deliveredAt: receipt.deliveredAt });
      expect(delivered[0].deliveredAt.getTime()).toBeGreaterThanOrEqual(delivered[0].createdAt.getTime());
    });

    test("a second call on the same order is not found", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      await h.orders.markDelivered(order.id);
      await expect(h.orders.markDelivered(order.id)).rejects.toBeInstanceOf(NotFoundError);
      expect(await h.orders.listDelivered()).toHaveLength(1);
    });

    test("concurrent calls on the same order deliver it once", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      const insert = jest.spyOn(h.deliveredRepo, "insert");

      const results = await Promise.allSettled([h.orders.markDelivered(order.id), h.orders.markDelivered(order.id)]);

      expect(results[0].status).toBe("fulfilled");
      expect(results[1].status).toBe("rejected");
      if (results[1].status === "rejected") {
        expect(results[1].reason).toBeInstanceOf(NotFoundError);
      }
      expect(insert).toHaveBeenCalledTimes(1);
      expect(await h.orders.listDelivered()).toHaveLength(1);
    });

    test("rejects a malformed identity before touching the store", async () => {
      const findById = jest.spyOn(h.orderRepo, "findById");
      await expect(h.orders.markDelivered("not-an-id")).rejects.toBeInstanceOf(InvalidInputError);
      expect(findById).not.toHaveBeenCalled();
    });

    test("a failed delivered insert leaves the order active", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest
        .spyOn(h.deliveredRepo, "insert")
        .mockRejectedValueOnce(new PersistenceError("delivered.insert", new Error("timeout")));

      await expect(h.orders.markDelivered(order.id)).rejects.toBeInstanceOf(PersistenceError);
      expect(await h.orderRepo.findById(order.id)).not.toBeNull();
      expect(await h.orders.listDelivered()).toEqual([]);
    });

    test("a failed active delete is compensated and can be retried", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest
        .spyOn(h.orderRepo, "delete")
        .mockRejectedValueOnce(new PersistenceError("orders.delete", new Error("connection reset")));

      await expect(h.orders.markDelivered(order.id)).rejects.toBeInstanceOf(PersistenceError);
      expect(await h.orderRepo.findById(order.id)).not.toBeNull();
      expect(await h.deliveredRepo.findById(order.id)).toBeNull();

      await h.orders.markDelivered(order.id);
      expect(await h.orderRepo.findById(order.id)).toBeNull();
      expect(await h.deliveredRepo.findById(order.id)).not.toBeNull();
    });

    test("a failed compensation surfaces a consistency error and leaves both copies", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest.spyOn(h.orderRepo, "delete").mockRejectedValueOnce(new Error("connection reset"));
      jest.spyOn(h.deliveredRepo, "delete").mockRejectedValueOnce(new Error("connection reset"));

      const failure = await h.orders.markDelivered(order.id).catch((e: unknown) => e);
      expect(failure).toBeInstanceOf(ConsistencyError);
      if (failure instanceof ConsistencyError) {
        expect(failure.recordId).toBe(order.id);
        expect(failure.orderId).toBe(1);
      }
      expect(await h.orderRepo.findById(order.id)).not.toBeNull();
      expect(await h.deliveredRepo.findById(order.id)).not.toBeNull();
    });

    test("an order already copied to delivered is reported for reconciliation, not moved again", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      await h.deliveredRepo.insert({ ...order, status: "delivered", deliveredAt: new Date() });
      const remove = jest.spyOn(h.orderRepo, "delete");

      await expect(h.orders.markDelivered(order.id)).rejects.toBeInstanceOf(ConsistencyError);
      expect(remove).not.toHaveBeenCalled();
      expect(await h.orderRepo.findById(order.id)).not.toBeNull();
    });

    test("an active copy that vanished mid-transition still counts as delivered", async () => {
      const order = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest.spyOn(h.orderRepo, "delete").mockResolvedValueOnce(false);

      const receipt = await h.orders.markDelivered(order.id);
      expect(receipt.orderId).toBe(1);
      expect(await h.deliveredRepo.findById(order.id)).not.toBeNull();
    });

    test("delivered order ids are not reused", async () => {
      await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      const second = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      await h.orders.markDelivered(second.id);

      const third = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      expect(third.orderId).toBe(3);
    });

    test("delivered list is newest delivery first", async () => {
      const a = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      const b = await h.orders.create({ customer: JANE, items: [{ productId: 1, quantity: 1 }] });
      jest.setSystemTime(new Date("2025-01-01T11:00:00Z"));
      await h.orders.markDelivered(b.id);
      jest.setSystemTime(new Date("2025-01-01T12:00:00Z"));
      await h.orders.markDelivered(a.id);

      expect((await h.orders.listDelivered()).map(o => o.orderId)).toEqual([1, 2]);
    });
  });
});
