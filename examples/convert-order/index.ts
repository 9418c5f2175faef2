import fs from "fs";
import { createOrderConverter } from "../../src/index.js";
import { createLogger } from "../../src/utils/logger.js";

const template = fs.readFileSync(new URL("../../inputs/baseEDI.XML", import.meta.url), "utf-8");
const csv = fs.readFileSync(new URL("../../inputs/order.csv", import.meta.url), "utf-8");

const converter = createOrderConverter({
  template,
  logger: createLogger("debug", false),
  debug: true,
});

const result = converter.convert(csv);
if (result.ok) {
  console.log(result.value.fileName);
  console.log(result.value.xml);
  console.log(JSON.stringify(result.meta));
} else {
  console.error(JSON.stringify(result.error));
}
