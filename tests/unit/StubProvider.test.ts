import { StubProvider } from "../../src/llm/providers/StubProvider";

describe("StubProvider", () => {
  const stub = new StubProvider();

  it("reads a sale as a negative change", async () => {
    await expect(stub.interpret("I sold 3 t shirts")).resolves.toEqual({
      operation: "POST",
      item: "tshirts",
      change: -3,
      reasoning: "Matched 'sold' with quantity 3."
    });
  });

  it("reads additions as a positive change", async () => {
    await expect(stub.interpret("Add 5 pants")).resolves.toEqual({
      operation: "POST",
      item: "pants",
      change: 5,
      reasoning: "Matched 'add' with quantity 5."
    });
  });

  it("treats questions as reads", async () => {
    await expect(stub.interpret("What's the stock of tshirts?")).resolves.toEqual({
      operation: "GET",
      item: "tshirts",
      change: null,
      reasoning: "No stock change requested, reading inventory."
    });
  });

  it("leaves the item out when both are mentioned", async () => {
    const intent = await stub.interpret("How many pants and shirts do I have?");
    expect(intent.operation).toBe("GET");
    expect(intent.item).toBeNull();
  });

  it("matches verbs as whole words with their suffixes", async () => {
    await expect(stub.interpret("Selling 2 pants")).resolves.toMatchObject({ operation: "POST", change: -2 });
    await expect(stub.interpret("Restocked 4 tshirts")).resolves.toMatchObject({ operation: "POST", change: 4 });
    await expect(stub.interpret("What is the address for the 2 pants?")).resolves.toMatchObject({ operation: "GET" });
    await expect(stub.interpret("Any additional tshirts?")).resolves.toMatchObject({ operation: "GET" });
    await expect(stub.interpret("Do we have plush pants?")).resolves.toMatchObject({ operation: "GET" });
  });

  it("leaves the change out when no quantity is given", async () => {
    await expect(stub.interpret("Add some pants")).resolves.toEqual({
      operation: "POST",
      item: "pants",
      change: null,
      reasoning: "Matched 'add' but found no quantity."
    });
  });
});
