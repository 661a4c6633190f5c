import type { SqlDialect } from "./types.js";

interface DialectProfile {
  name: string;
  rowLimitRule: string;
  examples: { question: string; answer: string }[];
}

const DIALECT_PROFILES: Record<SqlDialect, DialectProfile> = {
  sqlserver: {
    name: "SQL Server",
    rowLimitRule: "Use SQL Server syntax (TOP instead of LIMIT)",
    examples: [
      {
        question: "Show top 5 customers by revenue",
        answer:
          "SELECT TOP 5 Customers.CustomerID, Customers.CustomerName, SUM(Orders.OrderTotal) AS Revenue FROM Customers JOIN Orders ON Customers.CustomerID = Orders.CustomerID GROUP BY Customers.CustomerID, Customers.CustomerName ORDER BY Revenue DESC",
      },
      {
        question: "How many orders in 2024",
        answer: "SELECT COUNT(*) AS OrderCount FROM Orders WHERE YEAR(OrderDate) = 2024",
      },
      {
        question: "Average product price by category",
        answer:
          "SELECT CategoryName, AVG(Price) AS AvgPrice FROM Products JOIN Categories ON Products.CategoryID = Categories.CategoryID GROUP BY CategoryName",
      },
    ],
  },
  postgresql: {
    name: "PostgreSQL",
    rowLimitRule: "Use PostgreSQL syntax (LIMIT instead of TOP, double quotes for mixed-case identifiers)",
    examples: [
      {
        question: "Show top 5 customers by revenue",
        answer:
          "SELECT customers.customer_id, customers.customer_name, SUM(orders.order_total) AS revenue FROM customers JOIN orders ON customers.customer_id = orders.customer_id GROUP BY customers.customer_id, customers.customer_name ORDER BY revenue DESC LIMIT 5",
      },
      {
        question: "How many orders in 2024",
        answer: "SELECT COUNT(*) AS order_count FROM orders WHERE EXTRACT(YEAR FROM order_date) = 2024",
      },
      {
        question: "Average product price by category",
        answer:
          "SELECT categories.category_name, AVG(products.price) AS avg_price FROM products JOIN categories ON products.category_id = categories.category_id GROUP BY categories.category_name",
      },
    ],
  },
  clickhouse: {
    name: "ClickHouse",
    rowLimitRule: "Use ClickHouse syntax (LIMIT instead of TOP, toYear()/toStartOfMonth() for dates)",
    examples: [
      {
        question: "Show top 5 customers by revenue",
        answer:
          "SELECT customer_id, customer_name, sum(order_total) AS revenue FROM orders GROUP BY customer_id, customer_name ORDER BY revenue DESC LIMIT 5",
      },
      {
        question: "How many orders in 2024",
        answer: "SELECT count() AS order_count FROM orders WHERE toYear(order_date) = 2024",
      },
      {
        question: "Average product price by category",
        answer: "SELECT category_name, avg(price) AS avg_price FROM products GROUP BY category_name",
      },
    ],
  },
};

export function dialectName(dialect: SqlDialect): string {
  return DIALECT_PROFILES[dialect].name;
}

export function buildGenerationPrompt(dialect: SqlDialect, schemaDescription: string, question: string): string {
  const profile = DIALECT_PROFILES[dialect];
  const examples = profile.examples
    .map((e) => `Question: "${e.question}"\nAnswer: ${e.answer}`)
    .join("\n\n");

  return `You are an expert ${profile.name} database assistant. Your ONLY job is to generate a valid SQL query.

DATABASE SCHEMA:
${schemaDescription}

USER QUESTION: ${question}

CRITICAL RULES - READ CAREFULLY:
1. Output ONLY the SQL query - nothing else
2. No explanations, no markdown, no commentary
3. Use EXACT table and column names from the schema above
4. ${profile.rowLimitRule}
5. Always use proper JOINs with ON clauses
6. Include WHERE clauses for filtering
7. Use aggregate functions (SUM, COUNT, AVG) when asking for totals or averages
8. Use ORDER BY when asking for 'top' or 'highest' or 'lowest'
9. Use GROUP BY when using aggregate functions with non-aggregated columns

EXAMPLES:
${examples}

NOW GENERATE THE SQL QUERY FOR THE USER'S QUESTION.
REMEMBER: Output ONLY the SQL query, starting with SELECT, INSERT, UPDATE, DELETE or WITH:`;
}

export function buildRetryPrompt(schemaDescription: string, question: string): string {
  return `GENERATE ONLY A VALID SQL QUERY. NO EXPLANATIONS.

Schema: ${schemaDescription}
Question: ${question}

Output format: SELECT ... FROM ... WHERE ...
Start your response with SELECT:`;
}

export interface SummaryPromptInput {
  question: string;
  sql: string;
  rowCount: number;
  statistics: string;
  sample: string;
}

export function buildSummaryPrompt(input: SummaryPromptInput): string {
  return `You are an expert data analyst. Analyze the query results and provide clear insights.

CONTEXT:
- User Question: "${input.question}"
- SQL Query: ${input.sql}
- Total Records: ${input.rowCount}

DATA STATISTICS:
${input.statistics}

SAMPLE DATA (first 5 rows):
${input.sample}

TASK:
Provide a professional analysis in 2-3 paragraphs that:

1. DIRECTLY ANSWERS the user's original question with specific numbers/facts from the data
2. Highlights the most important insights and patterns
3. Mentions any notable trends, outliers, or interesting findings
4. Uses simple, non-technical language
5. Is concise but informative (maximum 150 words)

IMPORTANT:
- Start with the direct answer to their question
- Use actual numbers from the data
- Be specific, not generic
- Don't explain SQL or technical details
- Focus on business insights

Your Analysis:`;
}
