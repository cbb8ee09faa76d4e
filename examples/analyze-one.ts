import path from "node:path";
import {ReceiptImageProcessor} from "../src/processors/image-processor";
import {hasIssues, qualityLabel} from "../src/interfaces/processing-result";

const [, , imagePathArg] = process.argv;
if (!imagePathArg) {
    console.error("Usage: tsx examples/analyze-one.ts path/to/receipt.jpg");
    process.exit(1);
}
const imagePath = path.resolve(process.cwd(), imagePathArg);

const processor = new ReceiptImageProcessor({ debug: true });
const { result } = await processor.processImageWithAnalysis(imagePath, "Gallery");

const conf = (result.overallConfidence * 100).toFixed(0);
console.log(`Quality: ${qualityLabel(result.overallConfidence)} (${conf}%)`);
if (hasIssues(result)) {
    for (const issue of result.qualityIssues) console.log(`  - ${issue}`);
}
console.log(`Manual adjustment available: ${result.canAdjustManually ? "yes" : "no"}`);
