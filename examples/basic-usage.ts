import {
  Analyzer,
  Die,
  Game,
  createRng,
  renderCounts,
  renderFaceCounts,
  renderWide,
} from "../src/index";

function basicGameExample() {
  const rng = createRng(42);
  const d6 = new Die([1, 2, 3, 4, 5, 6], { rng });
  const game = new Game([d6, d6, d6]);
  game.play(10);

  const analyzer = new Analyzer(game);
  console.log(renderWide(game.show("wide"), "3d6 x 10"));
  console.log(`\nJackpots: ${analyzer.jackpot()}\n`);
  console.log(renderFaceCounts(analyzer.faceCountsPerRoll()));
  console.log("");
  console.log(renderCounts(analyzer.comboCount(), "Combinations"));
}

basicGameExample();
