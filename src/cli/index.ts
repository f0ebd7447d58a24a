#!/usr/bin/env tsx
import { Command } from "commander";
import { commands as crawlCommands } from "./commands/crawl";

const program = new Command();

program
  .name("illust-harvest")
  .description("Crawl, filter and download illusts from the upstream image-sharing API")
  .version("0.1.0");

process.on("SIGINT", () => {
  console.log("\nUser exit");
  process.exit(0);
});

crawlCommands(program);

await program.parseAsync();
