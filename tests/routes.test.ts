import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { FastifyInstance } from "fastify";
import { createApp } from "../src/app.js";

interface ErrorResponse {
  errorCode: string;
  errorMessage: string;
  diagnostic?: { feasible: boolean; reasons: string[] };
}

const SPECIAL_ATTACKER = {
  baseStats: { hp: 75, atk: 60, def: 70, spa: 135, spd: 95, spe: 110 },
  evs: { spa: 252 },
  nature: "modest",
  types: ["psychic"],
};

const PHYSICAL_ATTACKER = {
  baseStats: { hp: 90, atk: 130, def: 80, spa: 60, spd: 70, spe: 100 },
  evs: { atk: 252, spe: 252 },
  nature: "adamant",
  types: ["fighting"],
};

const WALL = {
  baseStats: { hp: 70, atk: 100, def: 80, spa: 60, spd: 95, spe: 90 },
  evs: { spd: 252 },
  nature: "hardy",
  types: ["normal"],
};

const MIND_SURGE = { name: "mind-surge", type: "psychic", category: "special", basePower: 95 };

let app: FastifyInstance;

beforeAll(async () => {
  app = createApp({ logLevel: "silent" });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

// ---------------------------------------------------------------------------
// Service info
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("reports the active config", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });
    expect(response.statusCode).toBe(200);
    const body = response.json<{ status: string; calcConfigId: string; timestamp: string }>();
    expect(body.status).toBe("ok");
    expect(body.calcConfigId).toBe("doubles_lv50_v1");
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });
});

describe("GET /config", () => {
  it("returns the loaded defaults", async () => {
    const response = await app.inject({ method: "GET", url: "/config" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      calcConfigId: "doubles_lv50_v1",
      level: 50,
      defaultIv: 31,
      survivalRate: 0.9375,
      format: "doubles",
      maxKoHits: 4,
    });
  });
});

describe("GET /catalog", () => {
  it("lists types and natures", async () => {
    const response = await app.inject({ method: "GET", url: "/catalog" });
    expect(response.statusCode).toBe(200);
    const body = response.json<{ types: string[]; natures: Record<string, unknown> }>();
    expect(body.types).toHaveLength(18);
    expect(Object.keys(body.natures)).toHaveLength(25);
  });
});

// ---------------------------------------------------------------------------
// Stats and damage
// ---------------------------------------------------------------------------

describe("POST /stats", () => {
  it("fills level and IVs from the config", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/stats",
      payload: {
        baseStats: { hp: 80, atk: 100, def: 90, spa: 110, spd: 85, spe: 95 },
        evs: { hp: 4, spa: 252, spe: 252 },
        nature: "timid",
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      level: 50,
      nature: "timid",
      ivs: { hp: 31, atk: 31, def: 31, spa: 31, spd: 31, spe: 31 },
      evs: { hp: 4, atk: 0, def: 0, spa: 252, spd: 0, spe: 252 },
      stats: { hp: 156, atk: 108, def: 110, spa: 162, spd: 105, spe: 161 },
    });
  });
});

describe("POST /damage", () => {
  it("returns rolls, percentages and the verdict", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      payload: { attacker: SPECIAL_ATTACKER, defender: WALL, move: MIND_SURGE },
    });
    expect(response.statusCode).toBe(200);
    const body = response.json<{
      rolls: number[];
      minPercent: number;
      maxPercent: number;
      koChances: number[];
      verdict: unknown;
    }>();
    expect(body.rolls).toEqual([76, 77, 78, 79, 80, 81, 81, 82, 83, 84, 85, 86, 87, 88, 89, 90]);
    expect(body.minPercent).toBe(52.4);
    expect(body.maxPercent).toBe(62);
    expect(body.koChances).toEqual([0, 1, 1, 1]);
    expect(body.verdict).toEqual({ kind: "guaranteed-nhko", hits: 2 });
  });

  it("honors maxKoHits", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      payload: { attacker: SPECIAL_ATTACKER, defender: WALL, move: MIND_SURGE, maxKoHits: 2 },
    });
    expect(response.json<{ koChances: number[] }>().koChances).toEqual([0, 1]);
  });

  it("answers 422 for an unmodelled ability", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      payload: {
        attacker: { ...SPECIAL_ATTACKER, ability: "sheer-force" },
        defender: WALL,
        move: MIND_SURGE,
      },
    });
    expect(response.statusCode).toBe(422);
    expect(response.json<ErrorResponse>().errorCode).toBe("UNSUPPORTED_MECHANIC");
  });

  it("accepts an unmodelled effect on the side where it does nothing", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      payload: {
        attacker: { ...SPECIAL_ATTACKER, item: "focus-sash" },
        defender: { ...WALL, ability: "sheer-force" },
        move: MIND_SURGE,
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json<{ rolls: number[] }>().rolls).toEqual([
      76, 77, 78, 79, 80, 81, 81, 82, 83, 84, 85, 86, 87, 88, 89, 90,
    ]);
  });

  it("answers 422 for an unmodelled defensive item", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      payload: {
        attacker: SPECIAL_ATTACKER,
        defender: { ...WALL, item: "focus-sash" },
        move: MIND_SURGE,
      },
    });
    expect(response.statusCode).toBe(422);
    expect(response.json<ErrorResponse>().errorCode).toBe("UNSUPPORTED_MECHANIC");
  });

  it("answers 400 for an unknown item", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      payload: {
        attacker: { ...SPECIAL_ATTACKER, item: "mystery-orb" },
        defender: WALL,
        move: MIND_SURGE,
      },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorResponse>()).toEqual({
      errorCode: "VALIDATION_FAILED",
      errorMessage: "Unknown item 'mystery-orb'.",
    });
  });
});

describe("POST /damage/ko-threshold", () => {
  it("finds the attack investment for a guaranteed KO", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage/ko-threshold",
      payload: {
        attacker: { ...PHYSICAL_ATTACKER, nature: "hardy", evs: { spe: 252 } },
        defender: { ...WALL, evs: { hp: 252 } },
        move: { name: "fist-strike", type: "fighting", category: "physical", basePower: 85 },
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      reachable: true,
      threshold: { stat: "atk", evs: 252, koChance: 1 },
    });
  });
});

// ---------------------------------------------------------------------------
// Speed
// ---------------------------------------------------------------------------

describe("POST /speed/compare", () => {
  it("compares a raw speed against a build", async () => {
    // Neutral base 100 with 252 EVs is 152.
    const response = await app.inject({
      method: "POST",
      url: "/speed/compare",
      payload: {
        first: { speed: 130 },
        second: {
          build: {
            baseStats: { hp: 100, atk: 100, def: 100, spa: 100, spd: 100, spe: 100 },
            evs: { spe: 252 },
            nature: "hardy",
            types: ["normal"],
          },
        },
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      firstSpeed: 130,
      secondSpeed: 152,
      faster: "second",
      movesFirst: "second",
      difference: -22,
    });
  });
});

describe("POST /speed/turn-order", () => {
  const runner = {
    baseStats: { hp: 100, atk: 100, def: 100, spa: 100, spd: 100, spe: 100 },
    nature: "hardy",
    types: ["normal"],
  };

  it("puts a priority move ahead of a faster build", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/speed/turn-order",
      payload: {
        first: { speed: 80 },
        second: { build: runner },
        firstMove: { name: "aqua-jet" },
        secondMove: { name: "tackle" },
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      firstPriority: 1,
      secondPriority: 0,
      firstSpeed: 80,
      secondSpeed: 120,
      movesFirst: "first",
      decidedBy: "priority",
    });
  });

  it("orders by speed under trick room inside one bracket", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/speed/turn-order",
      payload: {
        first: { speed: 80 },
        second: { build: runner },
        firstMove: { name: "tackle" },
        secondMove: { name: "tackle" },
        context: { trickRoom: true },
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json<{ movesFirst: string; decidedBy: string }>()).toMatchObject({
      movesFirst: "first",
      decidedBy: "speed",
    });
  });

  it("answers 422 for an unmodelled speed ability", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/speed/turn-order",
      payload: {
        first: { speed: 80 },
        second: { build: { ...runner, ability: "unburden" } },
        firstMove: { name: "tackle" },
        secondMove: { name: "tackle" },
      },
    });
    expect(response.statusCode).toBe(422);
    expect(response.json<ErrorResponse>().errorCode).toBe("UNSUPPORTED_MECHANIC");
  });
});

describe("POST /speed/thresholds", () => {
  it("returns the EV window that moves first", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/speed/thresholds",
      payload: {
        subject: {
          baseStats: { hp: 100, atk: 100, def: 100, spa: 100, spd: 100, spe: 100 },
          nature: "hardy",
          types: ["normal"],
        },
        opponentSpeed: 130,
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ opponentSpeed: 130, minEvs: 84, maxEvs: 252 });
  });
});

describe("POST /speed/outspeed", () => {
  it("estimates against an explicit distribution", async () => {
    const distribution = [
      { speed: 130, weight: 0.5 },
      { speed: 150, weight: 0.25 },
      { speed: 170, weight: 0.25 },
    ];
    const response = await app.inject({
      method: "POST",
      url: "/speed/outspeed",
      payload: { subject: { speed: 150 }, distribution },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      mySpeed: 150,
      distribution,
      outspeed: 0.5,
      tie: 0.25,
      outsped: 0.25,
    });
  });

  it("builds the distribution from opponent spreads", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/speed/outspeed",
      payload: {
        subject: { speed: 160 },
        opponent: {
          baseSpeed: 100,
          spreads: [
            { nature: "jolly", speedEvs: 252, usage: 2 },
            { nature: "hardy", speedEvs: 252, usage: 1 },
            { nature: "adamant", speedEvs: 252, usage: 1 },
          ],
        },
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      mySpeed: 160,
      distribution: [
        { speed: 152, weight: 0.5 },
        { speed: 167, weight: 0.5 },
      ],
      outspeed: 0.5,
      tie: 0,
      outsped: 0.5,
    });
  });

  it("rejects a request with both opponent sources", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/speed/outspeed",
      payload: {
        subject: { speed: 160 },
        distribution: [{ speed: 150, weight: 1 }],
        opponent: { baseSpeed: 100, spreads: [{ nature: "jolly", speedEvs: 252, usage: 1 }] },
      },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorResponse>().errorCode).toBe("VALIDATION_FAILED");
  });
});

// ---------------------------------------------------------------------------
// Optimizers
// ---------------------------------------------------------------------------

describe("POST /spread/optimize", () => {
  const subject = {
    baseStats: { hp: 90, atk: 80, def: 90, spa: 110, spd: 90, spe: 80 },
    nature: "modest",
    types: ["water"],
  };
  const threats = [
    {
      id: "strike",
      attacker: PHYSICAL_ATTACKER,
      move: { name: "fist-strike", type: "fighting", category: "physical", basePower: 140 },
    },
    {
      id: "beam",
      attacker: SPECIAL_ATTACKER,
      move: { name: "mind-beam", type: "psychic", category: "special", basePower: 150 },
    },
  ];

  it("returns the cheapest spread with the config survival rate", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/spread/optimize",
      payload: { subject, threats, speed: { opponentSpeed: 100 }, role: "special" },
    });
    expect(response.statusCode).toBe(200);
    const body = response.json<{ feasible: boolean; evs: unknown; survivalRate: number }>();
    expect(body.feasible).toBe(true);
    expect(body.survivalRate).toBe(0.9375);
    expect(body.evs).toEqual({ hp: 20, atk: 0, def: 4, spa: 252, spd: 84, spe: 4 });
  });

  it("tunes hp for a held item unless asked not to", async () => {
    const payload = {
      subject: { ...subject, item: "leftovers" },
      threats,
      speed: { opponentSpeed: 100 },
      role: "special",
    };
    const tuned = await app.inject({ method: "POST", url: "/spread/optimize", payload });
    expect(tuned.statusCode).toBe(200);
    expect(tuned.json<{ evs: unknown }>().evs).toEqual({
      hp: 12, atk: 0, def: 4, spa: 252, spd: 92, spe: 4,
    });

    const untuned = await app.inject({
      method: "POST",
      url: "/spread/optimize",
      payload: { ...payload, tuneHp: false },
    });
    expect(untuned.json<{ evs: unknown }>().evs).toEqual({
      hp: 20, atk: 0, def: 4, spa: 252, spd: 84, spe: 4,
    });
  });

  it("returns the diagnostic with 200 by default", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/spread/optimize",
      payload: { subject, threats: [], speed: { opponentSpeed: 132 } },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json<{ feasible: boolean }>().feasible).toBe(false);
  });

  it("answers 422 when a feasible spread is required", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/spread/optimize",
      payload: { subject, threats: [], speed: { opponentSpeed: 132 }, requireFeasible: true },
    });
    expect(response.statusCode).toBe(422);
    const body = response.json<ErrorResponse>();
    expect(body.errorCode).toBe("INFEASIBLE_SPREAD");
    expect(body.diagnostic?.feasible).toBe(false);
    expect(body.diagnostic?.reasons).toEqual(["No speed investment moves first against speed 132."]);
  });
});

describe("POST /nature/optimize", () => {
  it("ranks natures for a speed target", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/nature/optimize",
      payload: {
        baseStats: { hp: 80, atk: 100, def: 80, spa: 80, spd: 80, spe: 110 },
        primary: { stat: "spe", value: 160 },
      },
    });
    expect(response.statusCode).toBe(200);
    const body = response.json<{ best: { nature: string; totalEvs: number }; savingsVersusNeutral: number }>();
    expect(body.best.nature).toBe("timid");
    expect(body.best.totalEvs).toBe(124);
    expect(body.savingsVersusNeutral).toBe(112);
  });
});

// ---------------------------------------------------------------------------
// Request errors
// ---------------------------------------------------------------------------

describe("Request errors", () => {
  it("answers 400 VALIDATION_FAILED for a body that fails its schema", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/stats",
      payload: { baseStats: { hp: 80 }, nature: "hardy" },
    });
    expect(response.statusCode).toBe(400);
    const body = response.json<ErrorResponse>();
    expect(body.errorCode).toBe("VALIDATION_FAILED");
    expect(body.errorMessage).toContain("/baseStats: must have required property 'atk'");
  });

  it("answers 400 VALIDATION_FAILED for an illegal EV spread", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/stats",
      payload: {
        baseStats: { hp: 80, atk: 100, def: 90, spa: 110, spd: 85, spe: 95 },
        evs: { atk: 250 },
        nature: "hardy",
      },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorResponse>().errorMessage).toBe(
      "EV for atk must be a multiple of 4, got 250",
    );
  });

  it("answers 400 BAD_REQUEST for malformed JSON", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/damage",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorResponse>().errorCode).toBe("BAD_REQUEST");
  });
});
