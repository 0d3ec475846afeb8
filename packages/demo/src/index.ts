#!/usr/bin/env node
/**
 * @basketwrap/demo - Terminal walkthrough of a wrapper deployment.
 *
 * deploy -> create assets -> configure basket -> bind feeds -> fund ->
 * preview -> value -> mint -> slippage refusal -> burn -> backing ->
 * stale-price refusal -> event history
 *
 * Uses the domain packages directly against the in-process host.
 */

import chalk from "chalk";
import { InMemoryAssetHost } from "@basketwrap/asset-host";
import { InMemoryEventStore } from "@basketwrap/event-store";
import { PRICE_DECIMALS, addBps, formatAmount, parseAmount, subtractBps } from "@basketwrap/ledger";
import { WrapperError, WrapperToken } from "@basketwrap/wrapper";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = Number(process.env["DEMO_DELAY_MS"] ?? 400);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                  MULTI-ASSET WRAPPER DEMO                ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("           One token, backed by a fixed basket            ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
}

function refused(err: unknown): void {
  if (err instanceof WrapperError) {
    console.log(chalk.red("    ✗ ") + chalk.red.bold(err.code) + chalk.gray(` ${err.message}`));
    return;
  }
  throw err;
}

const TOTAL_STEPS = 12;

const DEPLOYER = "0xdeployer";
const CUSTODY = "0xmaw";
const ALICE = "0xalice";

const FEED_DECIMALS = 8;

const ASSETS = [
  { token: "USDC", decimals: 6, weightBps: 4000, usd: "1.00" },
  { token: "WETH", decimals: 18, weightBps: 3500, usd: "3000.00" },
  { token: "WBTC", decimals: 8, weightBps: 2500, usd: "60000.00" },
] as const;

/** Display an asset amount in whole-token units. */
function units(token: string, amount: bigint): string {
  const decimals = ASSETS.find((a) => a.token === token)?.decimals ?? 0;
  return `${formatAmount(amount, decimals)} ${token}`;
}

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  A wrapper unit is minted by depositing every basket asset in"));
  console.log(chalk.gray("  proportion, and burned to withdraw them again.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Deploy ─────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Deploy");

  const host = new InMemoryAssetHost({ now: Math.floor(Date.now() / 1000) });
  const store = new InMemoryEventStore();
  const wrapper = new WrapperToken(
    { name: "Multi-Asset Wrapper", symbol: "MAW", owner: DEPLOYER, custody: CUSTODY },
    host,
    store,
  );
  ok(`${wrapper.name} (${wrapper.symbol}) deployed`);
  info("owner", wrapper.owner);
  info("custody", wrapper.custody);
  info("slippage", `${wrapper.slippageToleranceBps} bps`);

  await sleep(DELAY_MS);

  // ─── Step 2: Assets & feeds ─────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Assets & Price Feeds");

  for (const asset of ASSETS) {
    host.createAsset(asset.token, asset.decimals);
    host.createPriceFeed(`${asset.token}/USD`, FEED_DECIMALS, {
      answer: parseAmount(asset.usd, FEED_DECIMALS),
      updatedAt: host.now(),
    });
    ok(`${asset.token} (${asset.decimals} decimals), feed ${asset.token}/USD at $${asset.usd}`);
  }

  await sleep(DELAY_MS);

  // ─── Step 3: Basket ─────────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Configure Basket");

  const basket = wrapper.configureAssets(
    DEPLOYER,
    ASSETS.map((a) => a.token),
    ASSETS.map((a) => a.weightBps),
  );
  for (const entry of basket.entries) {
    info(entry.token, `${(entry.weightBps / 100).toFixed(2)}%`);
  }
  ok(`Basket version ${basket.version}`);

  await sleep(DELAY_MS);

  // ─── Step 4: Bind feeds ─────────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Bind Price Feeds");

  for (const asset of ASSETS) {
    const binding = await wrapper.configurePriceFeed(DEPLOYER, asset.token, `${asset.token}/USD`);
    info(asset.token, `${binding.feed} (${binding.decimals} decimals)`);
  }
  ok("Every basket asset is priceable");

  await sleep(DELAY_MS);

  // ─── Step 5: Fund ───────────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Fund & Approve");

  const mintAmount = 1_000_000n;
  const preview = wrapper.calculateMintAmounts(mintAmount);
  preview.tokens.forEach((token, i) => {
    const needed = preview.amounts[i] ?? 0n;
    const asset = host.getAsset(token);
    asset.mint(ALICE, needed * 2n);
    asset.approve(ALICE, CUSTODY, needed * 2n);
    info(token, units(token, needed * 2n));
  });
  ok(`${ALICE} funded and custody approved`);

  await sleep(DELAY_MS);

  // ─── Step 6: Value ──────────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, `Value ${mintAmount.toString()} MAW`);

  const valuation = await wrapper.valuation(mintAmount);
  for (const line of valuation.lines) {
    info(line.token, `${units(line.token, line.amount)} × ${formatAmount(line.price, PRICE_DECIMALS)} = ${line.value.toString()}`);
  }
  ok(`Basket value ${chalk.cyan.bold(valuation.total.toString())}`);

  await sleep(DELAY_MS);

  // ─── Step 7: Mint ───────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Mint");

  const maxValue = addBps(valuation.total, 100);
  const minted = await wrapper.mint(ALICE, mintAmount, maxValue);
  for (const line of minted.lines) {
    info("pulled", units(line.token, line.amount));
  }
  ok(`${ALICE} holds ${minted.balanceAfter.toString()} MAW (max value ${maxValue.toString()})`);

  await sleep(DELAY_MS);

  // ─── Step 8: Slippage ───────────────────────────────────────────────

  stepHeader(8, TOTAL_STEPS, "Slippage Bound");

  const tooLow = subtractBps(valuation.total, 200);
  info("maxValue", `${tooLow.toString()} (2% under value)`);
  try {
    await wrapper.mint(ALICE, mintAmount, tooLow);
  } catch (err) {
    refused(err);
  }
  ok(`Supply unchanged at ${wrapper.totalSupply.toString()}`);

  await sleep(DELAY_MS);

  // ─── Step 9: Burn ───────────────────────────────────────────────────

  stepHeader(9, TOTAL_STEPS, "Burn Half");

  const burnAmount = mintAmount / 2n;
  const burnValue = await wrapper.totalValue(burnAmount);
  const burned = await wrapper.burn(ALICE, burnAmount, subtractBps(burnValue, 100));
  for (const line of burned.lines) {
    info("paid", units(line.token, line.amount));
  }
  ok(`${ALICE} holds ${burned.balanceAfter.toString()} MAW`);

  await sleep(DELAY_MS);

  // ─── Step 10: Backing ───────────────────────────────────────────────

  stepHeader(10, TOTAL_STEPS, "Backing Report");

  const report = await wrapper.getBackingReport();
  for (const line of report.lines) {
    info(line.token, `held ${units(line.token, line.held)} / required ${units(line.token, line.required)}`);
  }
  if (report.fullyBacked) {
    ok(`Supply of ${report.totalSupply.toString()} fully backed`);
  } else {
    console.log(chalk.yellow("    ! Custody short of the current supply"));
  }

  await sleep(DELAY_MS);

  // ─── Step 11: Stale price ───────────────────────────────────────────

  stepHeader(11, TOTAL_STEPS, "Stale Price");

  host.advanceTime(7200);
  info("clock", "+2h, no new readings");
  try {
    await wrapper.burn(ALICE, burnAmount, 1n);
  } catch (err) {
    refused(err);
  }
  ok("Price-bounded operations fail closed");

  await sleep(DELAY_MS);

  // ─── Step 12: History ───────────────────────────────────────────────

  stepHeader(12, TOTAL_STEPS, "Event History");

  const events = wrapper.events();
  console.log();
  for (const stored of events) {
    console.log(chalk.gray(`    #${String(stored.version).padEnd(3)}`) + chalk.white(stored.event.type.padEnd(26)) + chalk.yellow(`${stored.hash.slice(0, 12)}...`));
  }

  const integrity = store.verifyIntegrity();
  if (integrity.valid) {
    ok(`Hash chain intact across ${events.length} events`);
  } else {
    console.log(chalk.red(`    ✗ ${integrity.errors.length} integrity errors`));
  }

  console.log();
  console.log(chalk.white("    Total supply:   ") + chalk.cyan.bold(wrapper.totalSupply.toString()));
  console.log(chalk.white("    Basket version: ") + chalk.cyan.bold(String(wrapper.basket().version)));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
