import { describe, it, expect } from "vitest";
import { RandomUtils } from "../../src/shared/utils/RandomUtils";

describe("RandomUtils", () => {
  it("debe repetir la secuencia con la misma semilla", () => {
    const first = new RandomUtils("test-seed");
    const second = new RandomUtils("test-seed");

    const drawn = [first.float(), first.intRange(0, 9), first.angle()];

    expect([second.float(), second.intRange(0, 9), second.angle()]).toEqual(drawn);
  });

  it("debe reiniciar la secuencia al volver a sembrar", () => {
    const random = new RandomUtils("test-seed");
    const drawn = [random.float(), random.float()];

    random.reseed();

    expect([random.float(), random.float()]).toEqual(drawn);
  });

  it("debe mantener intRange dentro de los límites inclusivos", () => {
    const random = new RandomUtils("test-seed");
    const values = new Set<number>();

    for (let i = 0; i < 200; i++) values.add(random.intRange(2, 4));

    expect([...values].sort()).toEqual([2, 3, 4]);
  });
});
