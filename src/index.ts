import "dotenv/config";
import express from "express";
import cors from "cors";
import recipeRoutes from "./routes/recipe";
import { errorHandler } from "./middleware/errors";

const app = express();
const PORT = process.env.PORT || 3001;

app.use(cors());
app.use(express.json({ limit: "15mb" }));

app.use("/api/recipe", recipeRoutes);

app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.use(errorHandler);

app.listen(PORT, () => {
  console.log(`Recipe ingestion server running on http://localhost:${PORT}`);
});
