#!/usr/bin/env tsx
/**
 * agentledger CLI: tips and bounties from the command line.
 *
 * Commands:
 *   keygen                          Generate Ed25519 keypair (your identity)
 *   config                          Show/set CLI configuration
 *   balance [identity]              Balance + allowances
 *   faucet [amount]                 Mint test tokens (whole tokens)
 *   approve <tips|bounties> <amt>   Set an allowance
 *   tip <identity> <amount>         Tip an agent
 *   batch-tip <identity:amount>...  Tip several agents at once
 *   bounty create <amount> <desc>   Post a bounty into escrow
 *   bounty list                     Open bounties (or --mine / --claimed)
 *   bounty view <id>                One bounty
 *   bounty award <id> <claimer>     Release a bounty to a claimer
 *   bounty cancel <id>              Refund an open bounty
 *   bounty reclaim <id>             Refund an expired bounty
 *   register <name>                 Set display name + profile
 *   stats [identity]                Tip and bounty totals
 *   events                          Event log (--agent to filter, --follow to poll)
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { keygenCommand } from "./commands/keygen.js";
import { configCommand } from "./commands/config-cmd.js";
import { balanceCommand } from "./commands/balance.js";
import { DEFAULT_FAUCET_TOKENS, faucetCommand } from "./commands/faucet.js";
import { approveCommand } from "./commands/approve.js";
import { batchTipCommand, tipCommand } from "./commands/tip.js";
import {
  bountyAwardCommand,
  bountyCancelCommand,
  bountyCreateCommand,
  bountyListCommand,
  bountyReclaimCommand,
  bountyViewCommand,
} from "./commands/bounty.js";
import { registerCommand } from "./commands/register.js";
import { statsCommand } from "./commands/stats.js";
import { eventsCommand } from "./commands/events.js";

interface UrlOption {
  url?: string;
}

async function configWith(opts: UrlOption): Promise<CliConfig> {
  const config = await loadConfig();
  if (opts.url) config.url = opts.url;
  return config;
}

const program = new Command();

program
  .name("agentledger")
  .description("Agent-to-agent tips and escrowed bounties")
  .version("0.1.0");

// ── identity ────────────────────────────────────────────────────────

program
  .command("keygen")
  .description("Generate an Ed25519 keypair; the public key is your identity")
  .option("-f, --force", "Overwrite an existing key file")
  .action(async (opts: { force?: boolean }) => {
    const config = await loadConfig();
    await keygenCommand(config, opts);
  });

program
  .command("register")
  .description("Register a display name and profile for your identity")
  .argument("<name>", "Display name")
  .option("-p, --profile <text>", "Profile text or URI")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (name: string, opts: UrlOption & { profile?: string }) => {
    await registerCommand(name, await configWith(opts), opts);
  });

// ── token ───────────────────────────────────────────────────────────

program
  .command("balance")
  .description("Show balance and allowances")
  .argument("[identity]", "Identity (default: your key)")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (identity: string | undefined, opts: UrlOption) => {
    await balanceCommand(identity, await configWith(opts));
  });

program
  .command("faucet")
  .description("Mint test tokens to yourself")
  .argument("[amount]", "Whole tokens", DEFAULT_FAUCET_TOKENS)
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (amount: string, opts: UrlOption) => {
    await faucetCommand(amount, await configWith(opts));
  });

program
  .command("approve")
  .description("Set the allowance of the tips or bounties account (0 revokes)")
  .argument("<spender>", "tips | bounties")
  .argument("<amount>", "Token amount, e.g. 12.5")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (spender: string, amount: string, opts: UrlOption) => {
    await approveCommand(spender, amount, await configWith(opts));
  });

// ── tips ────────────────────────────────────────────────────────────

program
  .command("tip")
  .description("Tip an agent")
  .argument("<identity>", "Recipient (64-char hex)")
  .argument("<amount>", "Token amount, e.g. 1.5")
  .option("--post-ref <ref>", "Post this tip rewards")
  .option("-m, --message <text>", "Message attached to the tip")
  .option("--no-approve", "Fail instead of raising the allowance")
  .option("-u, --url <url>", "Ledger URL override")
  .action(
    async (
      to: string,
      amount: string,
      opts: UrlOption & { postRef?: string; message?: string; approve?: boolean },
    ) => {
      await tipCommand(to, amount, await configWith(opts), opts);
    },
  );

program
  .command("batch-tip")
  .description("Tip several agents in one all-or-nothing transfer")
  .argument("<entries...>", "<identity>:<amount> pairs")
  .option("--no-approve", "Fail instead of raising the allowance")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (entries: string[], opts: UrlOption & { approve?: boolean }) => {
    await batchTipCommand(entries, await configWith(opts), opts);
  });

// ── bounties ────────────────────────────────────────────────────────

const bountyCmd = program.command("bounty").description("Escrowed bounties");

bountyCmd
  .command("create")
  .description("Post a bounty; the amount moves into escrow")
  .argument("<amount>", "Token amount")
  .argument("<description>", "What the bounty pays for")
  .option("--hours <n>", "Deadline in hours from now (default: none)")
  .option("--ref <ref>", "External reference (issue URL, post id)")
  .option("--no-approve", "Fail instead of raising the allowance")
  .option("-u, --url <url>", "Ledger URL override")
  .action(
    async (
      amount: string,
      description: string,
      opts: UrlOption & { hours?: string; ref?: string; approve?: boolean },
    ) => {
      await bountyCreateCommand(amount, description, await configWith(opts), opts);
    },
  );

bountyCmd
  .command("list")
  .description("List open bounties")
  .option("--offset <n>", "Skip this many", "0")
  .option("--limit <n>", "Page size", "10")
  .option("--mine", "Bounties you posted, any status")
  .option("--claimed", "Bounties you were awarded")
  .option("-u, --url <url>", "Ledger URL override")
  .action(
    async (opts: UrlOption & { offset?: string; limit?: string; mine?: boolean; claimed?: boolean }) => {
      await bountyListCommand(await configWith(opts), opts);
    },
  );

bountyCmd
  .command("view")
  .description("Show one bounty")
  .argument("<id>", "Bounty id")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (id: string, opts: UrlOption) => {
    await bountyViewCommand(id, await configWith(opts));
  });

bountyCmd
  .command("award")
  .description("Release a bounty you posted to a claimer")
  .argument("<id>", "Bounty id")
  .argument("<claimer>", "Claimer identity (64-char hex)")
  .option("--proof <text>", "Proof of work (URL, hash)")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (id: string, claimer: string, opts: UrlOption & { proof?: string }) => {
    await bountyAwardCommand(id, claimer, await configWith(opts), opts);
  });

bountyCmd
  .command("cancel")
  .description("Cancel an open bounty you posted (full refund)")
  .argument("<id>", "Bounty id")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (id: string, opts: UrlOption) => {
    await bountyCancelCommand(id, await configWith(opts));
  });

bountyCmd
  .command("reclaim")
  .description("Reclaim a bounty you posted after its deadline")
  .argument("<id>", "Bounty id")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (id: string, opts: UrlOption) => {
    await bountyReclaimCommand(id, await configWith(opts));
  });

// ── views ───────────────────────────────────────────────────────────

program
  .command("stats")
  .description("Name, tip totals and bounty totals")
  .argument("[identity]", "Identity (default: your key)")
  .option("-u, --url <url>", "Ledger URL override")
  .action(async (identity: string | undefined, opts: UrlOption) => {
    await statsCommand(identity, await configWith(opts));
  });

program
  .command("events")
  .description("Print the ledger event log")
  .option("-t, --type <type>", "Only this event type, e.g. TipSent")
  .option("-a, --agent <identity>", "Only events involving this identity")
  .option("--from <seq>", "First sequence number")
  .option("--limit <n>", "Page size")
  .option("-f, --follow", "Keep polling for new events")
  .option("--interval <ms>", "Poll interval with --follow")
  .option("-u, --url <url>", "Ledger URL override")
  .action(
    async (
      opts: UrlOption & {
        type?: string;
        agent?: string;
        from?: string;
        limit?: string;
        follow?: boolean;
        interval?: string;
      },
    ) => {
      await eventsCommand(await configWith(opts), opts);
    },
  );

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("--url <url>", "Set ledger URL")
  .option("--key-path <path>", "Set key file path")
  .action(async (opts: { url?: string; keyPath?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
