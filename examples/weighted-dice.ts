import { Analyzer, Die, Game, createRng, renderCounts, renderDie } from "../src/index";

function loadedCoinExample() {
  const rng = createRng(7);
  const fair = new Die(["H", "T"], { rng });
  const loaded = new Die(["H", "T"], { rng });
  loaded.setWeight("H", 5);

  console.log(renderDie(fair.show(), "Fair coin"));
  console.log(renderDie(loaded.show(), "Loaded coin"));

  const game = new Game([fair, loaded]);
  game.play(1000);
  const analyzer = new Analyzer(game);

  console.log(`\nJackpots in 1000 tosses: ${analyzer.jackpot()}\n`);
  console.log(renderCounts(analyzer.permutationCount(), "Permutations"));
}

loadedCoinExample();
